import { ABSENT, isFieldValue, present, toFiniteNumber, toTimestamp } from './field-value';
import { FIELD_ALIASES, FieldAliasTable, buildAliasIndex, isCoreField } from './field-aliases';
import {
  FieldValue,
  NormalizeReport,
  NormalizedStream,
  RawRow,
  RawStream,
  TrackRecord,
} from './track.types';

export interface NormalizeOptions {
  aliases?: FieldAliasTable;
  /** Position of the stream among its siblings, stamped on every record. */
  index?: number;
}

type Cell =
  | { kind: 'none' }
  | { kind: 'absent' }
  | { kind: 'invalid' }
  | { kind: 'value'; value: number };

interface CompiledAliases {
  fields: Array<[string, readonly string[]]>;
  index: ReadonlyMap<string, string>;
}

const LAT_LIMIT = 90;
const LON_LIMIT = 180;

const compiledCache = new WeakMap<FieldAliasTable, CompiledAliases>();

function compile(table: FieldAliasTable): CompiledAliases {
  const cached = compiledCache.get(table);
  if (cached) return cached;

  const fields: Array<[string, readonly string[]]> = Object.entries(table).map(
    ([canonical, aliases]) => [
      canonical,
      aliases.includes(canonical) ? aliases : [canonical, ...aliases],
    ],
  );
  const compiled = { fields, index: buildAliasIndex(table) };
  compiledCache.set(table, compiled);
  return compiled;
}

function readNumber(raw: unknown): Cell {
  if (raw === undefined || raw === null) return { kind: 'none' };
  if (isFieldValue(raw) && !raw.present) return { kind: 'absent' };

  const value = toFiniteNumber(raw);
  return value === null ? { kind: 'invalid' } : { kind: 'value', value };
}

/** First alias holding a usable number wins; otherwise the worst miss is reported. */
function readAliased(row: RawRow, names: readonly string[]): Cell {
  let fallback: Cell = { kind: 'none' };
  for (const name of names) {
    const cell = readNumber(row[name]);
    if (cell.kind === 'value') return cell;
    if (cell.kind === 'invalid' || (cell.kind === 'absent' && fallback.kind === 'none')) {
      fallback = cell;
    }
  }
  return fallback;
}

function readCoordinate(row: RawRow, names: readonly string[], limit: number): number | null {
  for (const name of names) {
    const value = toFiniteNumber(row[name]);
    if (value !== null && Math.abs(value) <= limit) return value;
  }
  return null;
}

function readTimestamp(row: RawRow, names: readonly string[]): { seen: boolean; value: Date | null } {
  let seen = false;
  for (const name of names) {
    const raw = row[name];
    if (raw === undefined || raw === null) continue;
    seen = true;
    const value = toTimestamp(raw);
    if (value) return { seen, value };
  }
  return { seen, value: null };
}

function toValue(cell: Cell): FieldValue {
  return cell.kind === 'value' ? present(cell.value) : ABSENT;
}

/**
 * Converts one raw source stream into records with canonical field names.
 * Rows without a usable coordinate pair are dropped and counted; unusable
 * optional values become `ABSENT`. Never throws for bad data.
 */
export function normalizeStream(stream: RawStream, options: NormalizeOptions = {}): NormalizedStream {
  const { fields, index: aliasIndex } = compile(options.aliases ?? FIELD_ALIASES);
  const streamIndex = options.index ?? 0;
  const namesOf = (canonical: string): readonly string[] =>
    fields.find(([name]) => name === canonical)?.[1] ?? [canonical];

  const latNames = namesOf('lat');
  const lonNames = namesOf('lon');
  const eleNames = namesOf('ele');
  const timeNames = namesOf('timestamp');
  const optionalFields = fields.filter(([name]) => !isCoreField(name));

  const report: NormalizeReport = {
    rows: stream.rows.length,
    droppedRecords: 0,
    untimedRecords: 0,
    invalidValues: 0,
    unrecognizedFields: [],
  };
  const seen = new Set<string>();
  const extraOrder: string[] = [];
  const records: TrackRecord[] = [];

  const noteExtra = (name: string): void => {
    if (!seen.has(name)) {
      seen.add(name);
      extraOrder.push(name);
    }
  };

  for (const row of stream.rows) {
    const lat = readCoordinate(row, latNames, LAT_LIMIT);
    const lon = readCoordinate(row, lonNames, LON_LIMIT);
    if (lat === null || lon === null) {
      report.droppedRecords++;
      continue;
    }
    seen.add('lat');
    seen.add('lon');

    const time = readTimestamp(row, timeNames);
    if (time.seen) seen.add('timestamp');
    if (!time.value) report.untimedRecords++;

    const eleCell = readAliased(row, eleNames);
    if (eleCell.kind !== 'none') seen.add('ele');
    if (eleCell.kind === 'invalid') report.invalidValues++;

    const extra: Record<string, FieldValue> = {};
    for (const [canonical, names] of optionalFields) {
      const cell = readAliased(row, names);
      if (cell.kind === 'none') continue;
      if (cell.kind === 'invalid') report.invalidValues++;
      noteExtra(canonical);
      extra[canonical] = toValue(cell);
    }

    for (const [key, raw] of Object.entries(row)) {
      if (aliasIndex.has(key)) continue;
      const cell = readNumber(raw);
      if (cell.kind === 'none') continue;
      if (cell.kind === 'invalid') report.invalidValues++;
      if (!report.unrecognizedFields.includes(key)) report.unrecognizedFields.push(key);
      noteExtra(key);
      extra[key] = toValue(cell);
    }

    records.push({
      timestamp: time.value,
      lat,
      lon,
      ele: toValue(eleCell),
      extra,
      stream: streamIndex,
    });
  }

  for (const record of records) {
    for (const name of extraOrder) {
      if (!(name in record.extra)) record.extra[name] = ABSENT;
    }
  }

  const schema = [
    ...['timestamp', 'lat', 'lon', 'ele'].filter((name) => seen.has(name)),
    ...extraOrder,
  ];

  return {
    sourceKind: stream.sourceKind,
    label: stream.label ?? stream.sourceKind,
    schema,
    records,
    report,
  };
}

/** Flattens a record back into a canonical raw row. */
export function recordToRow(record: TrackRecord): RawRow {
  return {
    timestamp: record.timestamp,
    lat: record.lat,
    lon: record.lon,
    ele: record.ele,
    ...record.extra,
  };
}
