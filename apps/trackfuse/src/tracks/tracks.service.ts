import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { assembleTrack, pathRecords, type AssembledActivity, type GpxSelection } from '@trackfuse/track';
import { GPX_READER, type GpxReader } from '@trackfuse/gpx';
import { FIT_DECODER, type FitDecoder } from '@trackfuse/fit';
import {
  MAP_RENDERER,
  buildTrackRenderInput,
  type RenderMapResult,
  type TrackRenderer,
} from '@trackfuse/map-renderer';
import { toTrackView, type TrackView } from './track-view';

export interface RenderRequest {
  format: 'gpx' | 'fit';
  content: string;
  selection?: GpxSelection;
  name?: string;
  field?: string;
  extremumField?: string;
  range?: { min: number; max: number };
  width?: number;
  height?: number;
}

@Injectable()
export class TracksService {
  private readonly logger = new Logger(TracksService.name);

  constructor(
    @Inject(GPX_READER)
    private readonly gpxReader: GpxReader,
    @Inject(FIT_DECODER)
    private readonly fitDecoder: FitDecoder,
    @Inject(MAP_RENDERER)
    private readonly renderer: TrackRenderer,
  ) {}

  assembleGpx(gpxContent: string, selection: GpxSelection): AssembledActivity {
    const document = this.gpxReader.read(gpxContent);
    return assembleTrack({ kind: 'gpx', document }, { selection, logger: this.logger });
  }

  async assembleFit(fitContent: string): Promise<AssembledActivity> {
    const activity = await this.fitDecoder.decode(Buffer.from(fitContent, 'base64'));
    return assembleTrack({ kind: 'fit', activity }, { logger: this.logger });
  }

  ingestGpx(gpxContent: string, selection: GpxSelection, includeRecords = false): TrackView {
    return toTrackView(this.assembleGpx(gpxContent, selection), includeRecords);
  }

  async ingestFit(fitContent: string, includeRecords = false): Promise<TrackView> {
    return toTrackView(await this.assembleFit(fitContent), includeRecords);
  }

  async render(request: RenderRequest): Promise<RenderMapResult> {
    let activity: AssembledActivity;
    if (request.format === 'gpx') {
      if (!request.selection) {
        throw new BadRequestException('selection is required for GPX content');
      }
      activity = this.assembleGpx(request.content, request.selection);
    } else {
      activity = await this.assembleFit(request.content);
    }

    if (pathRecords(activity.track).length === 0) {
      throw new BadRequestException('Track has no positioned records to render');
    }

    const input = buildTrackRenderInput(activity.track, {
      name: request.name ?? this.defaultName(activity),
      field: request.field,
      range: request.range,
      extremumField: request.extremumField,
    });
    return this.renderer.renderTrack(input, { width: request.width, height: request.height });
  }

  private defaultName(activity: AssembledActivity): string {
    if (activity.kind === 'gpx') {
      const metadata = activity.passthrough.metadata ?? {};
      const trackNames = Array.isArray(metadata.trackNames) ? metadata.trackNames : [];
      const name = [metadata.name, ...trackNames].find(
        (candidate): candidate is string => typeof candidate === 'string' && candidate.length > 0,
      );
      if (name) {
        return name;
      }
    }
    return 'Unnamed Track';
  }
}
