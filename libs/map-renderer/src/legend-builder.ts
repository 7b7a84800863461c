import type { TrackRenderInput } from './map-renderer.types'

const CARD_PADDING = 40
const CARD_PADDING_X = 40
const CARD_MARGIN_X = 24
const CARD_MARGIN_BOTTOM = 24
const BORDER_RADIUS = 24
const LINE_HEIGHT = 56
const TITLE_SIZE = 40
const TEXT_SIZE = 28
const BAR_HEIGHT = 16
const BAR_GAP = 24

const BG_COLOR = 'rgba(255, 255, 255, 0.98)'
const TEXT_PRIMARY = '#111827'
const TEXT_SECONDARY = '#374151'
const TEXT_MUTED = '#6B7280'
const ATTRIBUTION_SIZE = 20

export const LEGEND_MARGIN_BOTTOM = CARD_MARGIN_BOTTOM

interface LegendLine {
  text: string
  size: number
  color: string
  bold: boolean
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
}

export function formatDistance(meters: number): string {
  return `${(meters / 1000).toFixed(1)} km`
}

export function formatRange(field: string, min: number, max: number): string {
  const round = (v: number) => Math.round(v * 10) / 10
  return min === max ? `${field} ${round(min)}` : `${field} ${round(min)}…${round(max)}`
}

export interface LegendOptions {
  gradientStops: string[]
  attribution?: string
}

function legendLines(input: TrackRenderInput, attribution?: string): LegendLine[] {
  const pointCount = input.polyline.lat.length
  const lines: LegendLine[] = [
    { text: input.name, size: TITLE_SIZE, color: TEXT_PRIMARY, bold: true },
    {
      text: `${formatDistance(input.distance)}  •  ${pointCount} points`,
      size: TEXT_SIZE,
      color: TEXT_SECONDARY,
      bold: false,
    },
  ]

  if (input.gradient) {
    const { field, range } = input.gradient
    lines.push({ text: formatRange(field, range.min, range.max), size: TEXT_SIZE, color: TEXT_SECONDARY, bold: false })
  }
  for (const marker of input.markers) {
    if (marker.label) {
      lines.push({ text: `● ${marker.label}`, size: TEXT_SIZE, color: TEXT_SECONDARY, bold: false })
    }
  }
  if (attribution) {
    lines.push({ text: attribution, size: ATTRIBUTION_SIZE, color: TEXT_MUTED, bold: false })
  }
  return lines
}

export function getLegendCardHeight(input: TrackRenderInput, attribution?: string): number {
  const contentHeight = legendLines(input, attribution).length * LINE_HEIGHT
  const barHeight = input.gradient ? BAR_HEIGHT + BAR_GAP : 0
  return contentHeight + barHeight + CARD_PADDING * 2
}

export function createLegendCardSvg(input: TrackRenderInput, mapWidth: number, options: LegendOptions): Buffer {
  const { gradientStops, attribution } = options
  const lines = legendLines(input, attribution)
  const cardHeight = getLegendCardHeight(input, attribution)
  const cardWidth = mapWidth - CARD_MARGIN_X * 2
  const textX = CARD_MARGIN_X + CARD_PADDING_X

  let textY = CARD_PADDING + LINE_HEIGHT - 12
  const textElements = lines
    .map((line) => {
      const element = `<text x="${textX}" y="${textY}" font-family="Arial, sans-serif" font-size="${line.size}" font-weight="${line.bold ? 'bold' : 'normal'}" fill="${line.color}">${escapeXml(line.text)}</text>`
      textY += LINE_HEIGHT
      return element
    })
    .join('\n  ')

  let gradientBar = ''
  if (input.gradient && gradientStops.length > 0) {
    const stops = gradientStops
      .map((color, i) => {
        const offset = gradientStops.length === 1 ? 0 : Math.round((i / (gradientStops.length - 1)) * 100)
        return `<stop offset="${offset}%" stop-color="${color}"/>`
      })
      .join('')
    const barY = textY - LINE_HEIGHT + BAR_GAP
    gradientBar = `<defs><linearGradient id="valueScale">${stops}</linearGradient></defs>
  <rect x="${textX}" y="${barY}" width="${cardWidth - CARD_PADDING_X * 2}" height="${BAR_HEIGHT}" rx="${BAR_HEIGHT / 2}" fill="url(#valueScale)"/>`
  }

  const svg = `<svg width="${mapWidth}" height="${cardHeight}" xmlns="http://www.w3.org/2000/svg">
  <defs>
    <filter id="cardShadow" x="-10%" y="-10%" width="120%" height="120%">
      <feDropShadow dx="0" dy="2" stdDeviation="8" flood-color="rgba(0,0,0,0.15)"/>
    </filter>
  </defs>
  <rect x="${CARD_MARGIN_X}" y="0" width="${cardWidth}" height="${cardHeight}" rx="${BORDER_RADIUS}" ry="${BORDER_RADIUS}" fill="${BG_COLOR}" filter="url(#cardShadow)"/>
  ${textElements}
  ${gradientBar}
</svg>`

  return Buffer.from(svg)
}
