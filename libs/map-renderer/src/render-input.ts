import {
  endpoints,
  extremum,
  summarizeTrack,
  toGradientPoints,
  toPolyline,
  type Track,
  type ValueRange,
} from '@trackfuse/track'
import type { MarkerData, TrackRenderInput } from './map-renderer.types'

export interface BuildRenderInputOptions {
  name: string
  /** Field coloured along the line; omitted for a plain polyline. */
  field?: string
  /** Colour scale; defaults to the field's observed range. */
  range?: ValueRange
  /** Field whose maximum gets a marker, e.g. `speed`. */
  extremumField?: string
}

export function buildTrackRenderInput(track: Track, options: BuildRenderInputOptions): TrackRenderInput {
  const markers: MarkerData[] = []
  const ends = endpoints(track)
  if (ends) {
    markers.push({ kind: 'start', lat: ends.first.lat, lon: ends.first.lon })
    markers.push({ kind: 'finish', lat: ends.last.lat, lon: ends.last.lon })
  }

  if (options.extremumField) {
    const peak = extremum(track, options.extremumField)
    if (peak) {
      markers.push({
        kind: 'extremum',
        lat: peak.record.lat,
        lon: peak.record.lon,
        label: `max ${options.extremumField} ${peak.value}`,
      })
    }
  }

  const input: TrackRenderInput = {
    name: options.name,
    distance: summarizeTrack(track).distance,
    polyline: toPolyline(track),
    markers,
  }

  if (options.field) {
    const series = toGradientPoints(track, options.field)
    const range = options.range ?? series.range
    if (range && series.points.length >= 2) {
      input.gradient = { field: series.field, points: series.points, range }
    }
  }
  return input
}
