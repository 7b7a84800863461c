import { Logger, Module, type DynamicModule } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { MapRendererService } from './map-renderer.service'
import { MAP_RENDERER } from './map-renderer.types'
import { TILE_PROVIDER, createTileProvider } from './providers'
import type { MapRendererConfig } from './map-renderer.config'

const logger = new Logger('MapRendererModule')

@Module({})
export class MapRendererModule {
  static register(): DynamicModule {
    return {
      module: MapRendererModule,
      providers: [
        {
          provide: TILE_PROVIDER,
          useFactory: (configService: ConfigService) =>
            createTileProvider(
              {
                provider: configService.get<MapRendererConfig['provider']>('mapRenderer.provider', 'osm'),
                stadiaApiKey: configService.get<string>('mapRenderer.stadiaApiKey'),
                stadiaStyle: configService.get<MapRendererConfig['stadiaStyle']>('mapRenderer.stadiaStyle', 'outdoors'),
              },
              (reason) => logger.warn(reason),
            ),
          inject: [ConfigService],
        },
        {
          provide: MAP_RENDERER,
          useClass: MapRendererService,
        },
      ],
      exports: [MAP_RENDERER],
    }
  }
}
