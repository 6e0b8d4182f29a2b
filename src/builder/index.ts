export * from './flow-builder'
export * from './node-factory'
export * from './registry'
export * from './types'
