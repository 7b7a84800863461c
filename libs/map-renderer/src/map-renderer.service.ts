import { Inject, Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import StaticMaps from 'staticmaps'
import sharp from 'sharp'

import {
  EmptyTrackRenderError,
  type GradientOverlay,
  type MarkerData,
  type RenderMapOptions,
  type RenderMapResult,
  type TrackRenderInput,
  type TrackRenderer,
} from './map-renderer.types'
import { createLegendCardSvg, getLegendCardHeight, LEGEND_MARGIN_BOTTOM } from './legend-builder'
import { gradientColor } from './gradient'
import { TILE_PROVIDER, type TileProvider } from './providers'
import { getPalette, type PaletteType, type TrackPalette } from './palette'

const DEFAULT_WIDTH = 1080
const DEFAULT_HEIGHT = 1350
const PADDING_X = 24
const PADDING_Y = 24
const MARKER_RADIUS = 10
const EXTREMUM_MARKER_RADIUS = 8
const SAME_POINT_TOLERANCE = 0.0001

type Coord = [number, number]

@Injectable()
export class MapRendererService implements TrackRenderer {
  private readonly logger = new Logger(MapRendererService.name)
  private readonly palette: TrackPalette

  constructor(
    @Inject(TILE_PROVIDER)
    private readonly tileProvider: TileProvider,
    private readonly configService: ConfigService,
  ) {
    const paletteType = this.configService.get<PaletteType>('mapRenderer.palette', 'default')
    this.palette = getPalette(paletteType)
  }

  async renderTrack(input: TrackRenderInput, options: RenderMapOptions = {}): Promise<RenderMapResult> {
    const { lat, lon } = input.polyline
    if (lat.length === 0 || lat.length !== lon.length) {
      throw new EmptyTrackRenderError()
    }

    const width = options.width ?? this.configService.get<number>('mapRenderer.imageWidth', DEFAULT_WIDTH)
    const height = options.height ?? this.configService.get<number>('mapRenderer.imageHeight', DEFAULT_HEIGHT)

    const tileConfig = this.tileProvider.getConfig()
    const cardHeight = getLegendCardHeight(input, tileConfig.attribution)
    const mapHeight = Math.max(height - cardHeight - LEGEND_MARGIN_BOTTOM, PADDING_Y * 4)

    const map = new StaticMaps({
      width,
      height: mapHeight,
      paddingX: PADDING_X,
      paddingY: PADDING_Y,
      tileUrl: tileConfig.tileUrl,
      tileRequestHeader: tileConfig.tileRequestHeader,
    })

    const coords: Coord[] = lat.map((la, i) => [lon[i], la])
    if (coords.length >= 2) {
      map.addLine({ coords, ...this.palette.halo })
      if (input.gradient) {
        this.addGradientSegments(map, input.gradient)
      } else {
        map.addLine({ coords, ...this.palette.line })
      }
    }
    this.addMarkers(map, input.markers)

    await map.render()
    const mapBuffer = await map.image.buffer('image/png')

    const legendSvg = createLegendCardSvg(input, width, {
      gradientStops: this.palette.gradientStops,
      attribution: tileConfig.attribution,
    })
    const finalBuffer = await sharp(mapBuffer)
      .extend({ bottom: cardHeight + LEGEND_MARGIN_BOTTOM, background: '#FFFFFF' })
      .composite([{ input: legendSvg, top: mapHeight, left: 0 }])
      .png()
      .toBuffer()

    this.logger.debug(`Rendered "${input.name}" with ${coords.length} points at ${width}x${height}`)

    return {
      buffer: finalBuffer,
      mimeType: 'image/png',
    }
  }

  /** One line per consecutive pair, coloured by the pair's mean value. */
  private addGradientSegments(map: StaticMaps, gradient: GradientOverlay): void {
    const { points, range } = gradient
    for (let i = 1; i < points.length; i++) {
      const [lat1, lon1, v1] = points[i - 1]
      const [lat2, lon2, v2] = points[i]
      map.addLine({
        coords: [
          [lon1, lat1],
          [lon2, lat2],
        ],
        color: gradientColor((v1 + v2) / 2, range, this.palette.gradientStops),
        width: this.palette.line.width,
      })
    }
  }

  private addMarkers(map: StaticMaps, markers: MarkerData[]): void {
    const start = markers.find((m) => m.kind === 'start')

    for (const marker of markers) {
      if (marker.kind === 'finish' && start && this.isSamePoint(start, marker)) continue

      map.addCircle({
        coord: [marker.lon, marker.lat],
        radius: marker.kind === 'extremum' ? EXTREMUM_MARKER_RADIUS : MARKER_RADIUS,
        fill: this.palette.markers[marker.kind],
        width: 2,
        color: '#FFFFFF',
      })
    }
  }

  private isSamePoint(a: MarkerData, b: MarkerData): boolean {
    return Math.abs(a.lat - b.lat) < SAME_POINT_TOLERANCE && Math.abs(a.lon - b.lon) < SAME_POINT_TOLERANCE
  }
}
