import { Body, Controller, HttpCode, HttpStatus, Post, StreamableFile } from '@nestjs/common';
import { TracksService } from './tracks.service';
import type { TrackView } from './track-view';
import { IngestGpxDto } from './dto/ingest-gpx.dto';
import { IngestFitDto } from './dto/ingest-fit.dto';
import { RenderTrackDto } from './dto/render-track.dto';
import { toGpxSelection } from './dto/gpx-selection.dto';

@Controller('tracks')
export class TracksController {
  constructor(private readonly tracksService: TracksService) {}

  @Post('gpx')
  @HttpCode(HttpStatus.OK)
  ingestGpx(@Body() dto: IngestGpxDto): TrackView {
    return this.tracksService.ingestGpx(dto.gpxContent, toGpxSelection(dto.selection), dto.includeRecords);
  }

  @Post('fit')
  @HttpCode(HttpStatus.OK)
  ingestFit(@Body() dto: IngestFitDto): Promise<TrackView> {
    return this.tracksService.ingestFit(dto.fitContent, dto.includeRecords);
  }

  @Post('render')
  @HttpCode(HttpStatus.OK)
  async render(@Body() dto: RenderTrackDto): Promise<StreamableFile> {
    const range =
      dto.rangeMin !== undefined && dto.rangeMax !== undefined
        ? { min: dto.rangeMin, max: dto.rangeMax }
        : undefined;
    const result = await this.tracksService.render({
      format: dto.format,
      content: dto.content,
      selection: dto.selection ? toGpxSelection(dto.selection) : undefined,
      name: dto.name,
      field: dto.field,
      extremumField: dto.extremumField,
      range,
      width: dto.width,
      height: dto.height,
    });
    return new StreamableFile(result.buffer, { type: result.mimeType });
  }
}
