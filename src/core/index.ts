/**
 * Core module - shared types, configuration, errors and scheduling
 */

export * from './types'
export * from './config'
export * from './errors'
export * from './scheduler'
