import { ABSENT, present } from './field-value';
import { normalizeStream } from './stream-normalizer';
import { mergeStreams } from './stream-merger';
import { NormalizedStream, RawRow } from './track.types';

const at = (second: number): Date => new Date(Date.UTC(2024, 4, 1, 8, 0, second));

const fitTable = (rows: RawRow[]): NormalizedStream =>
  normalizeStream({ sourceKind: 'fit-record-definition', rows });

describe('mergeStreams', () => {
  const gps = () =>
    fitTable([
      { timestamp: at(0), position_lat: 46.0, position_long: 7.0, speed: 3 },
      { timestamp: at(2), position_lat: 46.1, position_long: 7.1, speed: 4 },
      { timestamp: at(4), position_lat: 46.2, position_long: 7.2, speed: 5 },
    ]);
  const heart = () =>
    fitTable([
      { timestamp: at(3), position_lat: 46.15, position_long: 7.15, heart_rate: 150 },
      { timestamp: at(1), position_lat: 46.05, position_long: 7.05, heart_rate: 140 },
    ]);

  it('orders records from all streams by timestamp', () => {
    const track = mergeStreams([gps(), heart()]);

    expect(track.records.map((r) => r.timestamp?.getTime())).toEqual(
      [0, 1, 2, 3, 4].map((s) => at(s).getTime()),
    );
    for (let i = 1; i < track.records.length; i++) {
      const prev = track.records[i - 1].timestamp?.getTime() ?? NaN;
      const next = track.records[i].timestamp?.getTime() ?? NaN;
      expect(prev).toBeLessThanOrEqual(next);
    }
  });

  it('unions the schemas of all streams', () => {
    const track = mergeStreams([gps(), heart()]);
    expect(track.schema).toEqual(['timestamp', 'lat', 'lon', 'speed', 'heart_rate']);
  });

  it('marks fields from other sensors as absent, never zero', () => {
    const track = mergeStreams([gps(), heart()]);

    expect(track.records[0].extra).toEqual({ speed: present(3), heart_rate: ABSENT });
    expect(track.records[1].extra).toEqual({ speed: ABSENT, heart_rate: present(140) });
    expect(track.records[1].stream).toBe(1);
    expect(track.report.missingValues).toBe(5);
  });

  it('keeps stream order for records at the same instant', () => {
    const a = fitTable([{ timestamp: at(5), position_lat: 1, position_long: 1 }]);
    const b = fitTable([{ timestamp: at(5), position_lat: 2, position_long: 2 }]);

    expect(mergeStreams([a, b]).records.map((r) => r.lat)).toEqual([1, 2]);
    expect(mergeStreams([b, a]).records.map((r) => r.lat)).toEqual([2, 1]);
  });

  it('skips a stream without valid records and merges the rest', () => {
    const broken = fitTable([{ timestamp: at(0), position_lat: 'x', position_long: 7 }]);
    const track = mergeStreams([broken, gps()]);

    expect(track.records).toHaveLength(3);
    expect(track.report.streams).toBe(2);
    expect(track.report.emptyStreams).toBe(1);
    expect(track.report.droppedRecords).toBe(1);
    expect(track.records[0].stream).toBe(1);
  });

  it('returns an empty track for no streams', () => {
    const track = mergeStreams([]);

    expect(track.records).toEqual([]);
    expect(track.untimed).toEqual([]);
    expect(track.schema).toEqual([]);
    expect(track.report.streams).toBe(0);
  });

  it('sets untimed records aside', () => {
    const track = mergeStreams([
      fitTable([
        { timestamp: at(1), position_lat: 1, position_long: 1 },
        { position_lat: 2, position_long: 2 },
      ]),
    ]);

    expect(track.records.map((r) => r.lat)).toEqual([1]);
    expect(track.untimed.map((r) => r.lat)).toEqual([2]);
    expect(track.report.untimedRecords).toBe(1);
  });

  it('counts absent slots on untimed records too', () => {
    const track = mergeStreams([
      fitTable([
        { timestamp: at(1), position_lat: 1, position_long: 1, speed: 2 },
        { position_lat: 2, position_long: 2, heart_rate: 120 },
      ]),
    ]);

    expect(track.untimed[0].extra).toEqual({ speed: ABSENT, heart_rate: present(120) });
    expect(track.report.missingValues).toBe(2);
  });
});
