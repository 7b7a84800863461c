export * from './track.types';
export * from './field-value';
export * from './field-aliases';
export * from './stream-normalizer';
export * from './stream-merger';
export * from './track-assembler';
export * from './track-metrics';
export * from './render-series';
export * from './geo-utils';
