import type { RawFitActivity } from '@trackfuse/track';

export interface FitDecoder {
  decode(content: Buffer): Promise<RawFitActivity>;
}

export const FIT_DECODER = Symbol('FIT_DECODER');
