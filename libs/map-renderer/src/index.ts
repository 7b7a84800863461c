export * from './map-renderer.types'
export * from './map-renderer.config'
export * from './map-renderer.module'
export * from './map-renderer.service'
export * from './render-input'
export * from './gradient'
export * from './palette'
export * from './providers'
