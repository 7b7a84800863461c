import { ABSENT } from './field-value';
import { isCoreField } from './field-aliases';
import { NormalizedStream, Track, TrackRecord, TrackReport } from './track.types';

export function emptyReport(): TrackReport {
  return {
    streams: 0,
    emptyStreams: 0,
    rows: 0,
    droppedRecords: 0,
    untimedRecords: 0,
    invalidValues: 0,
    missingValues: 0,
    unrecognizedFields: [],
  };
}

function unionSchema(streams: NormalizedStream[]): string[] {
  const schema: string[] = [];
  for (const stream of streams) {
    for (const field of stream.schema) {
      if (!schema.includes(field)) schema.push(field);
    }
  }
  return schema;
}

/**
 * Combines concurrently recorded streams into one track. The schema is the
 * union of the inputs; a field a stream never reported is `ABSENT` on that
 * stream's records. Ordering is by timestamp, ties keep stream order.
 */
export function mergeStreams(streams: NormalizedStream[]): Track {
  const schema = unionSchema(streams);
  const extras = schema.filter((field) => !isCoreField(field));
  const report = emptyReport();

  const timed: TrackRecord[] = [];
  const untimed: TrackRecord[] = [];

  streams.forEach((stream, streamIndex) => {
    report.streams++;
    report.rows += stream.report.rows;
    report.droppedRecords += stream.report.droppedRecords;
    report.untimedRecords += stream.report.untimedRecords;
    report.invalidValues += stream.report.invalidValues;
    for (const field of stream.report.unrecognizedFields) {
      if (!report.unrecognizedFields.includes(field)) report.unrecognizedFields.push(field);
    }

    if (stream.records.length === 0) {
      report.emptyStreams++;
      return;
    }

    for (const record of stream.records) {
      const extra = { ...record.extra };
      for (const field of extras) {
        if (!(field in extra)) extra[field] = ABSENT;
      }
      const merged: TrackRecord = { ...record, extra, stream: streamIndex };
      (merged.timestamp ? timed : untimed).push(merged);
    }
  });

  // Array.prototype.sort is stable, so equal instants keep concatenation order.
  timed.sort((a, b) => timeOf(a) - timeOf(b));

  const hasEle = schema.includes('ele');
  for (const record of [...timed, ...untimed]) {
    if (hasEle && !record.ele.present) report.missingValues++;
    for (const field of extras) {
      if (!record.extra[field].present) report.missingValues++;
    }
  }

  return { schema, records: timed, untimed, report };
}

function timeOf(record: TrackRecord): number {
  return record.timestamp ? record.timestamp.getTime() : 0;
}
