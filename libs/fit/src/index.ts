export * from './fit-decoder.interface';
export * from './fit-file-decoder';
export * from './record-tables';
