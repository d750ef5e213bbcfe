/**
 * Registry module exports.
 */
export { LoggerRegistry } from './registry.js'
