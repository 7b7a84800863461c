import type { ValueRange } from '@trackfuse/track'

type Rgb = [number, number, number]

function parseHex(hex: string): Rgb {
  const value = parseInt(hex.replace('#', ''), 16)
  return [(value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff]
}

function toHex([r, g, b]: Rgb): string {
  return '#' + [r, g, b].map((c) => Math.round(c).toString(16).padStart(2, '0')).join('')
}

/**
 * Linear interpolation across `stops` for `value` scaled into `range`.
 * Values outside the range clamp to the end stops.
 */
export function gradientColor(value: number, range: ValueRange, stops: string[]): string {
  if (stops.length === 0) throw new Error('Gradient needs at least one colour stop')
  if (stops.length === 1) return stops[0]

  const span = range.max - range.min
  const t = span > 0 ? Math.min(1, Math.max(0, (value - range.min) / span)) : 0
  const position = t * (stops.length - 1)
  const index = Math.min(Math.floor(position), stops.length - 2)
  const frac = position - index

  const from = parseHex(stops[index])
  const to = parseHex(stops[index + 1])
  return toHex([
    from[0] + (to[0] - from[0]) * frac,
    from[1] + (to[1] - from[1]) * frac,
    from[2] + (to[2] - from[2]) * frac,
  ])
}
