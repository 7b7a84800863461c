export * from './tile-providers'
