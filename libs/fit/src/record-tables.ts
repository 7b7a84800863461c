import type { RawRow, RawStream } from '@trackfuse/track';

function definitionKey(row: RawRow): string {
  return Object.keys(row)
    .filter((key) => row[key] !== undefined && row[key] !== null)
    .sort()
    .join(',');
}

/**
 * Splits decoded record messages into one table per record definition. FIT
 * devices define a message layout once and then stream rows in it, so rows
 * with the same set of defined fields belong together. Tables keep the order
 * in which their first row appeared.
 */
export function splitRecordTables(rows: RawRow[]): RawStream[] {
  const tables = new Map<string, RawStream>();

  for (const row of rows) {
    const key = definitionKey(row);
    let table = tables.get(key);
    if (!table) {
      table = { sourceKind: 'fit-record-definition', label: `record[${tables.size}]`, rows: [] };
      tables.set(key, table);
    }
    table.rows.push(row);
  }

  return [...tables.values()];
}
