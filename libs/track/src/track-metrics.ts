import { calculateElevationGain, pathLength } from './geo-utils';
import { BoundingBox, FieldValue, Track, TrackRecord, ValueRange } from './track.types';

export interface Endpoints {
  first: TrackRecord;
  last: TrackRecord;
}

export interface Extremum {
  record: TrackRecord;
  value: number;
  /** Position of `record` in `pathRecords(track)`. */
  index: number;
}

export type ExtremumMode = 'max' | 'min';

export interface TrackSummary {
  points: number;
  distance: number;
  elevationGain: number;
  durationSeconds: number | null;
  bounds: BoundingBox | null;
  endpoints: Endpoints | null;
}

/** Reads a numeric field of a record by canonical name; `timestamp` is not numeric. */
export function readField(record: TrackRecord, field: string): FieldValue | undefined {
  switch (field) {
    case 'lat':
      return { present: true, value: record.lat };
    case 'lon':
      return { present: true, value: record.lon };
    case 'ele':
      return record.ele;
    case 'timestamp':
      return undefined;
    default:
      return record.extra[field];
  }
}

/**
 * Records in path order: the timed ones chronologically, or, when nothing in
 * the track carries a time, the untimed ones in arrival order.
 */
export function pathRecords(track: Track): TrackRecord[] {
  return track.records.length > 0 ? track.records : track.untimed;
}

/** Every positioned record, timed or not. */
export function spatialRecords(track: Track): TrackRecord[] {
  return [...track.records, ...track.untimed];
}

export function boundingBox(track: Track): BoundingBox | null {
  const records = spatialRecords(track);
  if (records.length === 0) return null;

  let minLat = Infinity, maxLat = -Infinity;
  let minLon = Infinity, maxLon = -Infinity;

  for (const r of records) {
    if (r.lat < minLat) minLat = r.lat;
    if (r.lat > maxLat) maxLat = r.lat;
    if (r.lon < minLon) minLon = r.lon;
    if (r.lon > maxLon) maxLon = r.lon;
  }

  return { minLat, maxLat, minLon, maxLon };
}

export function endpoints(track: Track): Endpoints | null {
  const records = pathRecords(track);
  if (records.length === 0) return null;
  return { first: records[0], last: records[records.length - 1] };
}

/**
 * Record holding the largest (or smallest) present value of `field`. Ties go
 * to the earliest record. `null` when the field is unknown to the track or
 * never present.
 */
export function extremum(track: Track, field: string, mode: ExtremumMode = 'max'): Extremum | null {
  if (!track.schema.includes(field)) return null;

  const records = pathRecords(track);
  let best: Extremum | null = null;
  for (let index = 0; index < records.length; index++) {
    const record = records[index];
    const cell = readField(record, field);
    if (!cell?.present) continue;
    if (!best || (mode === 'max' ? cell.value > best.value : cell.value < best.value)) {
      best = { record, value: cell.value, index };
    }
  }
  return best;
}

export function valueRange(track: Track, field: string): ValueRange | null {
  const low = extremum(track, field, 'min');
  const high = extremum(track, field, 'max');
  if (!low || !high) return null;
  return { min: low.value, max: high.value };
}

export function summarizeTrack(track: Track): TrackSummary {
  const path = pathRecords(track);
  const ends = endpoints(track);
  const first = ends?.first.timestamp;
  const last = ends?.last.timestamp;

  return {
    points: path.length,
    distance: Math.round(pathLength(path)),
    elevationGain: calculateElevationGain(path),
    durationSeconds: first && last ? (last.getTime() - first.getTime()) / 1000 : null,
    bounds: boundingBox(track),
    endpoints: ends,
  };
}
