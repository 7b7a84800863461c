import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { appConfig, validate } from '@trackfuse/config';
import { mapRendererConfig } from '@trackfuse/map-renderer';
import { AppController } from './app.controller';
import { TracksModule } from './tracks/tracks.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, mapRendererConfig],
      validate,
    }),
    TracksModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
