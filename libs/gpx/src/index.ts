export * from './gpx-reader.interface';
export * from './togeojson-reader';
