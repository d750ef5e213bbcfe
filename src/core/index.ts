/**
 * Core module exports.
 *
 * Everything public is exported from here; src/index.ts re-exports it
 * as the package entry.
 */

// Observer
export { observer } from './observer.js'
export type {
    SmartlogEvents,
    SmartlogEventNames,
    SmartlogEventCallback,
    ObserverEngine,
} from './observer.js'

// Severity
export * from './severity/index.js'

// Lock
export * from './lock/index.js'

// Logger
export * from './logger/index.js'

// Config
export * from './config/index.js'

// Registry
export * from './registry/index.js'

// Error bridge
export * from './bridge/index.js'
