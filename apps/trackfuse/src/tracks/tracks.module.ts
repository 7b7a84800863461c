import { Module } from '@nestjs/common';
import { GPX_READER, TogeojsonGpxReader } from '@trackfuse/gpx';
import { FIT_DECODER, FitFileDecoder } from '@trackfuse/fit';
import { MapRendererModule } from '@trackfuse/map-renderer';
import { TracksController } from './tracks.controller';
import { TracksService } from './tracks.service';

@Module({
  imports: [MapRendererModule.register()],
  controllers: [TracksController],
  providers: [
    TracksService,
    {
      provide: GPX_READER,
      useClass: TogeojsonGpxReader,
    },
    {
      provide: FIT_DECODER,
      useClass: FitFileDecoder,
    },
  ],
  exports: [TracksService],
})
export class TracksModule {}
