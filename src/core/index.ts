/**
 * Core module exports.
 *
 * All business logic modules are exported from here.
 * Embedding programs should import from this barrel file.
 */

// Observer
export { observer } from './observer.js'
export type { StrataEvents, StrataEventNames, StrataEventCallback, ObserverEngine } from './observer.js'

// Environment
export { isCi, isDebug } from './environment.js'

// Settings
export * from './settings/index.js'

// Project
export * from './project/index.js'

// Engine config
export * from './config/index.js'

// System database
export * from './db/index.js'

// Logger
export * from './logger/index.js'
