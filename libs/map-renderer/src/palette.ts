import type { MarkerKind } from './map-renderer.types'

export interface StrokeStyle {
  color: string
  width: number
}

export interface TrackPalette {
  /** Plain polyline, used when no value overlay is drawn. */
  line: StrokeStyle
  halo: StrokeStyle
  markers: Record<MarkerKind, string>
  /** Low → high colour stops for value overlays. */
  gradientStops: string[]
}

export type PaletteType = 'default' | 'subtle' | 'vibrant'

export const PALETTES: Readonly<Record<PaletteType, TrackPalette>> = {
  default: {
    line: { color: '#1E40AF', width: 4 },
    halo: { color: '#FFFFFF', width: 9 },
    markers: { start: '#16A34A', finish: '#B91C1C', extremum: '#F59E0B' },
    gradientStops: ['#2563EB', '#22C55E', '#EAB308', '#DC2626'],
  },
  subtle: {
    line: { color: '#475569', width: 3 },
    halo: { color: '#F1F5F9', width: 7 },
    markers: { start: '#4D7C0F', finish: '#9F1239', extremum: '#A16207' },
    gradientStops: ['#93C5FD', '#86EFAC', '#FDE68A', '#FCA5A5'],
  },
  vibrant: {
    line: { color: '#DB2777', width: 5 },
    halo: { color: '#0F172A', width: 10 },
    markers: { start: '#10B981', finish: '#F43F5E', extremum: '#FACC15' },
    gradientStops: ['#0D9488', '#34D399', '#FB923C', '#DC2626'],
  },
}

export function getPalette(type: PaletteType): TrackPalette {
  return PALETTES[type] ?? PALETTES.default
}
