/**
 * Configuration module.
 *
 * Validates per-logger settings and bulk registry input, and loads
 * registry configuration from YAML/JSON files.
 *
 * @example
 * ```typescript
 * import { parseRegistryConfig, loadRegistryConfig } from './config'
 *
 * const entries = parseRegistryConfig({
 *     default: ['/var/log/app', { severityThreshold: 'warn' }],
 * })
 *
 * const fromFile = await loadRegistryConfig('./loggers.yml')
 * ```
 */

// Schemas and validation
export {
    LoggerSettingsSchema,
    LoggerEntrySchema,
    RegistryConfigSchema,
    normalizeSettings,
    parseRegistryConfig,
} from './schema.js'

export type {
    LoggerEntryInput,
    RegistryConfigInput,
    RegistryEntry,
} from './schema.js'

// Errors
export { ConfigError } from './errors.js'

// Files
export { loadRegistryConfig } from './loader.js'
