import { registerAs } from '@nestjs/config'
import type { PaletteType } from './palette'

export type MapProviderType = 'osm' | 'stadia'
export type StadiaStyleType = 'stamen_terrain' | 'outdoors' | 'osm_bright' | 'alidade_smooth'

export interface MapRendererConfig {
  provider: MapProviderType
  stadiaApiKey: string | undefined
  stadiaStyle: StadiaStyleType
  imageWidth: number
  imageHeight: number
  palette: PaletteType
}

const PROVIDERS: readonly MapProviderType[] = ['osm', 'stadia']
const STADIA_STYLES: readonly StadiaStyleType[] = ['stamen_terrain', 'outdoors', 'osm_bright', 'alidade_smooth']
const PALETTES: readonly PaletteType[] = ['default', 'subtle', 'vibrant']

function oneOf<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  return allowed.find((option) => option === value) ?? fallback
}

export const mapRendererConfig = registerAs('mapRenderer', (): MapRendererConfig => ({
  provider: oneOf(process.env.MAP_PROVIDER, PROVIDERS, 'osm'),
  stadiaApiKey: process.env.STADIA_API_KEY,
  stadiaStyle: oneOf(process.env.STADIA_STYLE, STADIA_STYLES, 'outdoors'),
  imageWidth: parseInt(process.env.MAP_WIDTH || '1080', 10),
  imageHeight: parseInt(process.env.MAP_HEIGHT || '1350', 10),
  palette: oneOf(process.env.MAP_PALETTE, PALETTES, 'default'),
}))
