import { BadRequestException } from '@nestjs/common';
import type { RawFitActivity, RawGpxDocument } from '@trackfuse/track';
import { TrackSelectionError } from '@trackfuse/track';
import type { GpxReader } from '@trackfuse/gpx';
import type { FitDecoder } from '@trackfuse/fit';
import type { RenderMapOptions, TrackRenderInput, TrackRenderer } from '@trackfuse/map-renderer';
import { TracksService } from './tracks.service';

const gpxDocument = (): RawGpxDocument => ({
  metadata: { name: 'Ridge walk', trackNames: ['Ridge'] },
  waypoints: [],
  routes: [],
  tracks: [
    [
      [
        { lat: '47.0', lon: '8.0', ele: '500', time: '2024-05-01T08:00:00Z' },
        { lat: '47.1', lon: '8.0', ele: '520', time: '2024-05-01T08:10:00Z' },
      ],
    ],
  ],
});

const untimedRoute = (): RawGpxDocument => ({
  metadata: { name: 'Planned' },
  tracks: [
    [
      [
        { lat: '45.0', lon: '6.0' },
        { lat: '45.1', lon: '6.1' },
      ],
    ],
  ],
});

const fitActivity = (): RawFitActivity => ({
  records: [
    [
      { timestamp: '2024-05-01T08:00:05Z', position_lat: 46.5, position_long: 7.5, heart_rate: 120 },
      { timestamp: '2024-05-01T08:00:00Z', position_lat: 46.4, position_long: 7.5, heart_rate: 118 },
    ],
  ],
  sessions: [{ sport: 'cycling' }],
});

describe('TracksService', () => {
  let service: TracksService;
  let read: jest.Mock<RawGpxDocument, [string]>;
  let decode: jest.Mock<Promise<RawFitActivity>, [Buffer]>;
  let renderTrack: jest.Mock<ReturnType<TrackRenderer['renderTrack']>, [TrackRenderInput, RenderMapOptions?]>;

  beforeEach(() => {
    read = jest.fn((_content: string) => gpxDocument());
    decode = jest.fn(async (_content: Buffer) => fitActivity());
    renderTrack = jest.fn(async (_input: TrackRenderInput, _options?: RenderMapOptions) => ({ buffer: Buffer.from('png'), mimeType: 'image/png' as const }));

    const gpxReader: GpxReader = { read };
    const fitDecoder: FitDecoder = { decode };
    const renderer: TrackRenderer = { renderTrack };
    service = new TracksService(gpxReader, fitDecoder, renderer);
  });

  describe('ingestGpx', () => {
    it('returns the summary, schema and encoded polyline of the selected segments', () => {
      const view = service.ingestGpx('<gpx/>', { mode: 'all' });

      expect(read).toHaveBeenCalledWith('<gpx/>');
      expect(view.kind).toBe('gpx');
      expect(view.schema).toEqual(['timestamp', 'lat', 'lon', 'ele']);
      expect(view.summary.points).toBe(2);
      expect(view.summary.elevationGain).toBe(20);
      expect(view.summary.durationSeconds).toBe(600);
      expect(view.polyline).toBe('_uz}G_oyo@_pR?');
      expect(view.passthrough).toEqual({ metadata: { name: 'Ridge walk', trackNames: ['Ridge'] }, waypoints: [], routes: [] });
      expect(view.records).toBeUndefined();
    });

    it('serializes records with absent values as null when asked', () => {
      const view = service.ingestGpx('<gpx/>', { mode: 'tracks', tracks: [0] }, true);

      expect(view.records?.[0]).toEqual({
        timestamp: '2024-05-01T08:00:00.000Z',
        lat: 47,
        lon: 8,
        ele: 500,
        extra: {},
        stream: 0,
      });
    });

    it('keeps untimed records in the bounds and the serialized view', () => {
      read.mockReturnValueOnce({
        tracks: [
          [
            [
              { lat: '47.0', lon: '8.0', time: '2024-05-01T08:00:00Z' },
              { lat: '46.0', lon: '9.0' },
              { lat: '47.1', lon: '8.0', time: '2024-05-01T08:10:00Z' },
            ],
          ],
        ],
      });

      const view = service.ingestGpx('<gpx/>', { mode: 'all' }, true);

      expect(view.summary.points).toBe(2);
      expect(view.summary.bounds).toEqual({ minLat: 46, maxLat: 47.1, minLon: 8, maxLon: 9 });
      expect(view.untimedRecords).toBe(1);
      expect(view.records?.map((record) => record.lat)).toEqual([47, 47.1]);
      expect(view.untimed).toEqual([{ timestamp: null, lat: 46, lon: 9, ele: null, extra: {}, stream: 0 }]);
    });

    it('describes a route without timestamps', () => {
      read.mockReturnValueOnce(untimedRoute());

      const view = service.ingestGpx('<gpx/>', { mode: 'all' });

      expect(view.summary.points).toBe(2);
      expect(view.summary.durationSeconds).toBeNull();
      expect(view.summary.bounds).toEqual({ minLat: 45, maxLat: 45.1, minLon: 6, maxLon: 6.1 });
      expect(view.polyline).toBe('_atqG_{rc@_pR_pR');
    });

    it('propagates selection errors', () => {
      expect(() => service.ingestGpx('<gpx/>', { mode: 'tracks', tracks: [3] })).toThrow(TrackSelectionError);
    });
  });

  describe('ingestFit', () => {
    it('decodes base64 content and orders records by time', async () => {
      const view = await service.ingestFit(Buffer.from('fit-bytes').toString('base64'), true);

      expect(decode.mock.calls[0][0].toString()).toBe('fit-bytes');
      expect(view.kind).toBe('fit');
      expect(view.schema).toEqual(['timestamp', 'lat', 'lon', 'heart_rate']);
      expect(view.records?.map((record) => record.extra.heart_rate)).toEqual([118, 120]);
      expect(view.records?.[0].ele).toBeNull();
      expect(view.passthrough).toEqual({ sessions: [{ sport: 'cycling' }] });
    });
  });

  describe('render', () => {
    it('builds the render input from the track and names it after the GPX metadata', async () => {
      const result = await service.render({
        format: 'gpx',
        content: '<gpx/>',
        selection: { mode: 'all' },
        field: 'ele',
        width: 600,
      });

      expect(result.mimeType).toBe('image/png');
      const [input, options] = renderTrack.mock.calls[0];
      expect(input.name).toBe('Ridge walk');
      expect(input.polyline).toEqual({ lat: [47, 47.1], lon: [8, 8] });
      expect(input.gradient?.range).toEqual({ min: 500, max: 520 });
      expect(options).toEqual({ width: 600, height: undefined });
    });

    it('renders a route without timestamps in file order', async () => {
      read.mockReturnValueOnce(untimedRoute());

      await service.render({ format: 'gpx', content: '<gpx/>', selection: { mode: 'all' } });

      const [input] = renderTrack.mock.calls[0];
      expect(input.name).toBe('Planned');
      expect(input.polyline).toEqual({ lat: [45, 45.1], lon: [6, 6.1] });
      expect(input.markers.map((marker) => marker.kind)).toEqual(['start', 'finish']);
    });

    it('falls back to a generic name for FIT activities', async () => {
      await service.render({ format: 'fit', content: Buffer.from('x').toString('base64') });

      expect(renderTrack.mock.calls[0][0].name).toBe('Unnamed Track');
    });

    it('requires a selection for GPX content', async () => {
      await expect(service.render({ format: 'gpx', content: '<gpx/>' })).rejects.toThrow(BadRequestException);
      expect(read).not.toHaveBeenCalled();
    });

    it('refuses to render a track without records', async () => {
      decode.mockResolvedValueOnce({ records: [] });

      await expect(
        service.render({ format: 'fit', content: Buffer.from('x').toString('base64') }),
      ).rejects.toThrow('Track has no positioned records to render');
      expect(renderTrack).not.toHaveBeenCalled();
    });
  });
});
