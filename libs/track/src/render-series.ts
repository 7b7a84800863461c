import { valueOf } from './field-value';
import { pathRecords, readField } from './track-metrics';
import { Track, ValueRange } from './track.types';

/** Parallel coordinate sequences, the shape polyline layers take. */
export interface PolylineSeries {
  lat: number[];
  lon: number[];
}

export type GradientPoint = [lat: number, lon: number, value: number];

export interface GradientSeries {
  field: string;
  points: GradientPoint[];
  range: ValueRange | null;
}

export function toPolyline(track: Track): PolylineSeries {
  const records = pathRecords(track);
  return {
    lat: records.map((r) => r.lat),
    lon: records.map((r) => r.lon),
  };
}

/**
 * `[lat, lon, value]` triples for a colour-gradient overlay. Records without a
 * reading for `field` are left out rather than drawn as zero.
 */
export function toGradientPoints(track: Track, field = 'ele'): GradientSeries {
  const points: GradientPoint[] = [];
  let range: ValueRange | null = null;

  for (const record of pathRecords(track)) {
    const value = valueOf(readField(record, field));
    if (value === undefined) continue;
    points.push([record.lat, record.lon, value]);
    range = range
      ? { min: Math.min(range.min, value), max: Math.max(range.max, value) }
      : { min: value, max: value };
  }

  return { field, points, range };
}
