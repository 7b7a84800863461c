import { FieldValue } from './track.types';

export const ABSENT: FieldValue = Object.freeze({ present: false });

export function present(value: number): FieldValue {
  return { present: true, value };
}

export function isFieldValue(value: unknown): value is FieldValue {
  if (typeof value !== 'object' || value === null || !('present' in value)) {
    return false;
  }
  if (value.present === false) return true;
  return value.present === true && 'value' in value && typeof value.value === 'number';
}

export function valueOf(field: FieldValue | undefined): number | undefined {
  return field?.present ? field.value : undefined;
}

/**
 * Coerces a raw cell to a finite number. Numeric text is accepted, empty
 * text, booleans, dates and objects are not.
 */
export function toFiniteNumber(raw: unknown): number | null {
  if (isFieldValue(raw)) {
    return raw.present ? toFiniteNumber(raw.value) : null;
  }
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : null;
  }
  if (typeof raw === 'string') {
    const text = raw.trim();
    if (text === '') return null;
    const parsed = Number(text);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function toFieldValue(raw: unknown): FieldValue {
  const num = toFiniteNumber(raw);
  return num === null ? ABSENT : present(num);
}

/**
 * Normalizes a raw time cell to a `Date`. Text goes through `Date.parse`, so
 * ISO-8601 offsets are honoured; numbers are epoch milliseconds.
 */
export function toTimestamp(raw: unknown): Date | null {
  if (raw instanceof Date) {
    return Number.isNaN(raw.getTime()) ? null : new Date(raw.getTime());
  }
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? new Date(raw) : null;
  }
  if (typeof raw === 'string' && raw.trim() !== '') {
    const ms = Date.parse(raw.trim());
    return Number.isNaN(ms) ? null : new Date(ms);
  }
  return null;
}
