/* eslint-disable perfectionist/sort-exports */

// Core
export * from './workflow/index'
export * from './context'
export * from './state'
export * from './result'
export * from './errors'
export * from './logger'
export * from './types'

// Builders
export * from './builder/index'

// Executors
export * from './executors/in-memory'
export * from './executors/types'

// Utils
export * from './utils/index'
