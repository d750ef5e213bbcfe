/**
 * Configuration Zod schemas and validation.
 *
 * Settings are accepted in the forms people write them (severity name
 * prefixes, `'off'`, size strings) and normalized to numbers here, so
 * the logger itself only ever deals with ordinals and byte counts.
 */
import { z } from 'zod'
import { attemptSync } from '@logosdx/utils'

import { parseThreshold } from '../severity/index.js'
import { parseSize } from '../logger/rotation.js'
import { DEFAULT_LOGGER_SETTINGS } from '../logger/types.js'
import type { LoggerSettings, LoggerSettingsInput } from '../logger/types.js'
import { ConfigError } from './errors.js'


/**
 * Severity threshold: name prefix, ordinal, or 'off'.
 */
const ThresholdSchema = z
    .union([z.number().int(), z.string().min(1, 'Severity is required')])
    .transform((value, ctx) => {

        const [ordinal, err] = attemptSync(() => parseThreshold(value))

        if (err) {

            ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message })
            return z.NEVER
        }

        return ordinal
    })

/**
 * Size in bytes, or a size string like '10mb'.
 */
const SizeSchema = z
    .union([z.number().nonnegative(), z.string().min(1)])
    .transform((value, ctx) => {

        const [bytes, err] = attemptSync(() => parseSize(value))

        if (err) {

            ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message })
            return z.NEVER
        }

        return bytes
    })

/**
 * Per-logger settings overrides. Unknown keys are rejected.
 */
export const LoggerSettingsSchema = z
    .object({
        severityThreshold: ThresholdSchema.optional(),
        smartSeverityThreshold: ThresholdSchema.optional(),
        maxFileSize: SizeSchema.optional(),
        maxDays: z.number().nonnegative('maxDays cannot be negative').optional(),
        dateFormat: z.string().min(1, 'Date format is required').optional(),
        defaultPermission: z.number().int().min(0).max(0o7777, 'Permission must be a file mode').optional(),
    })
    .strict()

/**
 * One registry entry: directory first, then optional overrides.
 */
export const LoggerEntrySchema = z
    .tuple([z.string().min(1, 'Log directory is required')])
    .rest(LoggerSettingsSchema)
    .refine((entry) => entry.length <= 2, 'Expected [directory] or [directory, settings]')

/**
 * Bulk registry input: logger name -> entry.
 */
export const RegistryConfigSchema = z.record(
    z.string().min(1, 'Logger name is required'),
    LoggerEntrySchema,
)

export type LoggerEntryInput = z.input<typeof LoggerEntrySchema>
export type RegistryConfigInput = z.input<typeof RegistryConfigSchema>

/**
 * A validated registry entry.
 */
export interface RegistryEntry {
    directory: string;
    settings: LoggerSettings;
}


function toConfigError(error: z.ZodError, prefix = ''): ConfigError {

    const first = error.issues[0]
    const field = first?.path.join('.') || 'unknown'

    return new ConfigError(
        `${prefix}${first?.message ?? 'Configuration validation failed'}${first ? ` (at ${field})` : ''}`,
        field,
        error.issues,
    )
}


/**
 * Validate settings overrides and fill in defaults.
 *
 * @throws ConfigError on unknown keys or invalid values
 *
 * @example
 * ```typescript
 * normalizeSettings({ severityThreshold: 'warn', maxFileSize: '1mb' })
 * // { severityThreshold: 4, smartSeverityThreshold: 5, maxFileSize: 1048576, ... }
 * ```
 */
export function normalizeSettings(input: LoggerSettingsInput = {}): LoggerSettings {

    const result = LoggerSettingsSchema.safeParse(input)

    if (!result.success) {

        throw toConfigError(result.error)
    }

    return withDefaults(result.data)
}


function withDefaults(parsed: z.output<typeof LoggerSettingsSchema>): LoggerSettings {

    return {
        severityThreshold: parsed.severityThreshold ?? DEFAULT_LOGGER_SETTINGS.severityThreshold,
        smartSeverityThreshold: parsed.smartSeverityThreshold ?? DEFAULT_LOGGER_SETTINGS.smartSeverityThreshold,
        maxFileSize: parsed.maxFileSize ?? DEFAULT_LOGGER_SETTINGS.maxFileSize,
        maxDays: parsed.maxDays ?? DEFAULT_LOGGER_SETTINGS.maxDays,
        dateFormat: parsed.dateFormat ?? DEFAULT_LOGGER_SETTINGS.dateFormat,
        defaultPermission: parsed.defaultPermission ?? DEFAULT_LOGGER_SETTINGS.defaultPermission,
    }
}


/**
 * Validate bulk registry input.
 *
 * @throws ConfigError naming the first invalid entry
 *
 * @example
 * ```typescript
 * parseRegistryConfig({
 *     default: ['/var/log/app'],
 *     audit: ['/var/log/audit', { severityThreshold: 'notice', maxDays: 30 }],
 * })
 * ```
 */
export function parseRegistryConfig(input: unknown): Map<string, RegistryEntry> {

    const result = RegistryConfigSchema.safeParse(input)

    if (!result.success) {

        throw toConfigError(result.error)
    }

    const entries = new Map<string, RegistryEntry>()

    for (const [name, [directory, overrides]] of Object.entries(result.data)) {

        entries.set(name, {
            directory,
            settings: withDefaults(overrides ?? {}),
        })
    }

    return entries
}
