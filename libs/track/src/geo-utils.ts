import { TrackRecord } from './track.types';

export const toRad = (deg: number): number => (deg * Math.PI) / 180;

export interface GeoPoint {
  lat: number;
  lon: number;
}

/**
 * Haversine formula - great-circle distance between two points on a sphere.
 * Uses Earth's mean radius of 6371km.
 *
 * @returns Distance in meters
 */
export function haversine(p1: GeoPoint, p2: GeoPoint): number {
  const R = 6371000;

  const dLat = toRad(p2.lat - p1.lat);
  const dLon = toRad(p2.lon - p1.lon);

  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(p1.lat)) * Math.cos(toRad(p2.lat)) * Math.sin(dLon / 2) ** 2;

  return R * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

export function pathLength(points: GeoPoint[]): number {
  let total = 0;
  for (let i = 1; i < points.length; i++) {
    total += haversine(points[i - 1], points[i]);
  }
  return total;
}

/** Sum of positive steps between consecutive records that both carry an elevation. */
export function calculateElevationGain(records: TrackRecord[]): number {
  let totalGain = 0;

  for (let i = 1; i < records.length; i++) {
    const prev = records[i - 1].ele;
    const curr = records[i].ele;

    if (prev.present && curr.present) {
      const diff = curr.value - prev.value;
      if (diff > 0) {
        totalGain += diff;
      }
    }
  }

  return Math.round(totalGain);
}
