import type { MapRendererConfig } from '../map-renderer.config'

export interface TileProviderConfig {
  tileUrl: string
  tileRequestHeader?: Record<string, string>
  /** Printed on the legend card. */
  attribution: string
}

export interface TileProvider {
  getConfig(): TileProviderConfig
}

export const TILE_PROVIDER = Symbol('TILE_PROVIDER')

const OSM_ATTRIBUTION = '© OpenStreetMap contributors'

export class OsmTileProvider implements TileProvider {
  getConfig(): TileProviderConfig {
    return {
      tileUrl: 'https://tile.openstreetmap.org/{z}/{x}/{y}.png',
      tileRequestHeader: { 'User-Agent': 'trackfuse/0.1 (track rendering)' },
      attribution: OSM_ATTRIBUTION,
    }
  }
}

export class StadiaTileProvider implements TileProvider {
  constructor(
    private readonly apiKey: string,
    private readonly style: MapRendererConfig['stadiaStyle'],
  ) {}

  getConfig(): TileProviderConfig {
    const key = encodeURIComponent(this.apiKey)
    return {
      tileUrl: `https://tiles.stadiamaps.com/tiles/${this.style}/{z}/{x}/{y}.png?api_key=${key}`,
      attribution: `© Stadia Maps © OpenMapTiles ${OSM_ATTRIBUTION}`,
    }
  }
}

/**
 * Picks the tile source from configuration. Stadia without a key falls back
 * to OSM; `onFallback` receives the reason.
 */
export function createTileProvider(
  config: Pick<MapRendererConfig, 'provider' | 'stadiaApiKey' | 'stadiaStyle'>,
  onFallback: (reason: string) => void = () => undefined,
): TileProvider {
  if (config.provider !== 'stadia') {
    return new OsmTileProvider()
  }
  if (!config.stadiaApiKey) {
    onFallback('STADIA_API_KEY not set, falling back to OSM')
    return new OsmTileProvider()
  }
  return new StadiaTileProvider(config.stadiaApiKey, config.stadiaStyle)
}
