import type { GradientSeries, PolylineSeries, ValueRange } from '@trackfuse/track'

export type MarkerKind = 'start' | 'finish' | 'extremum'

export interface MarkerData {
  kind: MarkerKind
  lat: number
  lon: number
  label?: string
}

export interface GradientOverlay extends Omit<GradientSeries, 'range'> {
  /** Colour scale bounds, supplied by the caller. */
  range: ValueRange
}

export interface TrackRenderInput {
  name: string
  distance: number
  polyline: PolylineSeries
  gradient?: GradientOverlay
  markers: MarkerData[]
}

export interface RenderMapOptions {
  width?: number
  height?: number
}

export interface RenderMapResult {
  buffer: Buffer
  mimeType: 'image/png'
}

export interface TrackRenderer {
  renderTrack(input: TrackRenderInput, options?: RenderMapOptions): Promise<RenderMapResult>
}

export class EmptyTrackRenderError extends Error {
  constructor() {
    super('Cannot render a track without positioned records')
    this.name = 'EmptyTrackRenderError'
  }
}

export const MAP_RENDERER = Symbol('MAP_RENDERER')
