import * as polyline from '@mapbox/polyline';
import {
  summarizeTrack,
  toPolyline,
  type AssembledActivity,
  type FieldValue,
  type Track,
  type TrackRecord,
  type TrackReport,
  type TrackSummary,
} from '@trackfuse/track';

export interface SerializedRecord {
  timestamp: string | null;
  lat: number;
  lon: number;
  ele: number | null;
  extra: Record<string, number | null>;
  stream: number;
}

export interface TrackView {
  kind: AssembledActivity['kind'];
  schema: string[];
  summary: TrackSummary;
  report: TrackReport;
  untimedRecords: number;
  /** Google encoded polyline, precision 5. */
  polyline: string;
  passthrough: AssembledActivity['passthrough'];
  records?: SerializedRecord[];
  /** Positioned records without a usable timestamp, in arrival order. */
  untimed?: SerializedRecord[];
}

const valueOrNull = (value: FieldValue): number | null => (value.present ? value.value : null);

export function serializeRecord(record: TrackRecord): SerializedRecord {
  const extra: Record<string, number | null> = {};
  for (const [field, value] of Object.entries(record.extra)) {
    extra[field] = valueOrNull(value);
  }
  return {
    timestamp: record.timestamp ? record.timestamp.toISOString() : null,
    lat: record.lat,
    lon: record.lon,
    ele: valueOrNull(record.ele),
    extra,
    stream: record.stream,
  };
}

export function encodeTrack(track: Track): string {
  const { lat, lon } = toPolyline(track);
  return polyline.encode(lat.map((la, i): [number, number] => [la, lon[i]]));
}

export function toTrackView(activity: AssembledActivity, includeRecords = false): TrackView {
  const { track } = activity;
  const view: TrackView = {
    kind: activity.kind,
    schema: track.schema,
    summary: summarizeTrack(track),
    report: track.report,
    untimedRecords: track.untimed.length,
    polyline: encodeTrack(track),
    passthrough: activity.passthrough,
  };
  if (includeRecords) {
    view.records = track.records.map(serializeRecord);
    view.untimed = track.untimed.map(serializeRecord);
  }
  return view;
}
