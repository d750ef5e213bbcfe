/**
 * smartlog
 *
 * File-based CSV logging with smart severity escalation, inter-process
 * locking, rotation and retention.
 *
 * @example
 * ```typescript
 * import { LoggerRegistry, ErrorBridge } from 'smartlog'
 *
 * const registry = await LoggerRegistry.configure({
 *     default: ['/var/log/app', { severityThreshold: 'warning' }],
 * })
 *
 * new ErrorBridge(registry).install()
 *
 * registry.get()?.info('started')
 * ```
 */
export * from './core/index.js'
