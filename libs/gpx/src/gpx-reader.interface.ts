import type { RawGpxDocument } from '@trackfuse/track';

export interface GpxReader {
  read(gpxContent: string): RawGpxDocument;
}

export const GPX_READER = Symbol('GPX_READER');
