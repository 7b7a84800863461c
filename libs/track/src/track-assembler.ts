import { FieldAliasTable } from './field-aliases';
import { normalizeStream } from './stream-normalizer';
import { mergeStreams } from './stream-merger';
import {
  ActivitySource,
  NormalizedStream,
  RawFitActivity,
  RawGpxDocument,
  RawRow,
  RawStream,
  Track,
} from './track.types';

export class TrackSelectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TrackSelectionError';
  }
}

export interface SegmentRef {
  track: number;
  segment: number;
}

/**
 * Which GPX track segments to ingest. There is no default: picking only the
 * first track silently would hide the rest of the file.
 */
export type GpxSelection =
  | { mode: 'all' }
  | { mode: 'tracks'; tracks: number[] }
  | { mode: 'segments'; segments: SegmentRef[] };

export interface IngestLogger {
  log(message: string): void;
  warn(message: string): void;
}

export interface AssembleOptions {
  /** Required for GPX sources, ignored for FIT. */
  selection?: GpxSelection;
  aliases?: FieldAliasTable;
  logger?: IngestLogger;
}

export type GpxPassthrough = Omit<RawGpxDocument, 'tracks'>;
export type FitPassthrough = Omit<RawFitActivity, 'records'>;

export type AssembledActivity =
  | { kind: 'gpx'; track: Track; passthrough: GpxPassthrough }
  | { kind: 'fit'; track: Track; passthrough: FitPassthrough };

export function selectGpxSegments(document: RawGpxDocument, selection: GpxSelection): RawStream[] {
  const toStream = (rows: RawRow[], track: number, segment: number): RawStream => ({
    sourceKind: 'gpx-track',
    label: `trk[${track}].seg[${segment}]`,
    rows,
  });

  const trackAt = (index: number): RawRow[][] => {
    const track = document.tracks[index];
    if (!Number.isInteger(index) || track === undefined) {
      throw new TrackSelectionError(
        `Track ${index} does not exist (document has ${document.tracks.length})`,
      );
    }
    return track;
  };

  switch (selection.mode) {
    case 'all':
      return document.tracks.flatMap((segments, t) => segments.map((rows, s) => toStream(rows, t, s)));
    case 'tracks':
      return selection.tracks.flatMap((t) => trackAt(t).map((rows, s) => toStream(rows, t, s)));
    case 'segments':
      return selection.segments.map(({ track, segment }) => {
        const rows = trackAt(track)[segment];
        if (!Number.isInteger(segment) || rows === undefined) {
          throw new TrackSelectionError(`Segment ${segment} of track ${track} does not exist`);
        }
        return toStream(rows, track, segment);
      });
  }
}

export function fitRecordStreams(activity: RawFitActivity): RawStream[] {
  return activity.records.map((table, index): RawStream =>
    Array.isArray(table)
      ? { sourceKind: 'fit-record-definition', label: `record[${index}]`, rows: table }
      : table,
  );
}

function summarize(track: Track): string {
  const { report } = track;
  return (
    `${track.records.length} records from ${report.streams} streams ` +
    `(${report.rows} rows, ${report.droppedRecords} dropped, ${report.untimedRecords} untimed, ` +
    `${report.invalidValues} invalid values)`
  );
}

/**
 * Entry point of the ingestion core: one parsed activity in, one ordered
 * track out. Empty input yields an empty track, never an exception.
 */
export function assembleTrack(source: ActivitySource, options: AssembleOptions = {}): AssembledActivity {
  const normalize = (streams: RawStream[]): NormalizedStream[] =>
    streams.map((stream, index) => normalizeStream(stream, { aliases: options.aliases, index }));

  let result: AssembledActivity;
  if (source.kind === 'gpx') {
    if (!options.selection) {
      throw new TrackSelectionError('GPX ingestion requires an explicit track selection');
    }
    const { tracks: _tracks, ...passthrough } = source.document;
    const track = mergeStreams(normalize(selectGpxSegments(source.document, options.selection)));
    result = { kind: 'gpx', track, passthrough };
  } else {
    const { records: _records, ...passthrough } = source.activity;
    const track = mergeStreams(normalize(fitRecordStreams(source.activity)));
    result = { kind: 'fit', track, passthrough };
  }

  if (options.logger) {
    options.logger.log(`Assembled ${source.kind} activity: ${summarize(result.track)}`);
    if (result.track.report.droppedRecords > 0) {
      options.logger.warn(`Dropped ${result.track.report.droppedRecords} rows without a usable position`);
    }
  }
  return result;
}
