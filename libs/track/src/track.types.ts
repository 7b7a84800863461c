/**
 * A reading that is either there or explicitly missing. `Absent` is distinct
 * from a zero reading: it means the originating sensor had nothing to say.
 */
export type FieldValue =
  | { readonly present: true; readonly value: number }
  | { readonly present: false };

export type SourceKind = 'gpx-track' | 'fit-record-definition';

export type RawRow = Record<string, unknown>;

export interface RawStream {
  sourceKind: SourceKind;
  label?: string;
  rows: RawRow[];
}

export interface TrackRecord {
  /** `null` when the source row had no usable time; such records are never merged chronologically. */
  timestamp: Date | null;
  lat: number;
  lon: number;
  ele: FieldValue;
  extra: Record<string, FieldValue>;
  /** Index of the stream the record came from. */
  stream: number;
}

export interface NormalizeReport {
  rows: number;
  droppedRecords: number;
  untimedRecords: number;
  invalidValues: number;
  unrecognizedFields: string[];
}

export interface NormalizedStream {
  sourceKind: SourceKind;
  label: string;
  schema: string[];
  records: TrackRecord[];
  report: NormalizeReport;
}

export interface TrackReport extends NormalizeReport {
  streams: number;
  emptyStreams: number;
  /** `ABSENT` slots across timed and untimed records, `ele` included. */
  missingValues: number;
}

export interface Track {
  schema: string[];
  records: TrackRecord[];
  untimed: TrackRecord[];
  report: TrackReport;
}

export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLon: number;
  maxLon: number;
}

export interface ValueRange {
  min: number;
  max: number;
}

export interface RawGpxDocument {
  metadata?: Record<string, unknown>;
  bounds?: BoundingBox;
  waypoints?: RawRow[];
  routes?: RawRow[][];
  /** tracks → segments → rows */
  tracks: RawRow[][][];
}

export interface RawFitActivity {
  /** One table per record definition, in order of first appearance. */
  records: Array<RawStream | RawRow[]>;
  [messageType: string]: unknown;
}

export type ActivitySource =
  | { kind: 'gpx'; document: RawGpxDocument }
  | { kind: 'fit'; activity: RawFitActivity };
