/**
 * Severity Scale
 *
 * Bidirectional mapping between severity names and ordinal ranks.
 * Ranks follow RFC 5424: 0 is the most severe, 7 the most verbose.
 * OFF sits outside the scale and disables a logger entirely.
 */
import { UnknownSeverityError } from './errors.js'


/**
 * Severity names in rank order. Index is the ordinal.
 */
export const SEVERITIES = [
    'emergency',
    'alert',
    'critical',
    'error',
    'warning',
    'notice',
    'informational',
    'debug',
] as const

export type SeverityName = typeof SEVERITIES[number]

/**
 * Named ordinals, plus the OFF sentinel.
 */
export const Severity = {
    OFF: -1,
    EMERGENCY: 0,
    ALERT: 1,
    CRITICAL: 2,
    ERROR: 3,
    WARNING: 4,
    NOTICE: 5,
    INFORMATIONAL: 6,
    DEBUG: 7,
} as const

/**
 * Anything a caller may pass where a severity is expected.
 */
export type SeverityInput = number | string

/**
 * Number of ranks on the scale (OFF excluded).
 */
export const SEVERITY_COUNT = SEVERITIES.length


/**
 * Resolve a severity to its ordinal.
 *
 * Numbers pass through unchanged. Strings are lower-cased and matched
 * as a prefix against the table, scanning from emergency to debug; the
 * first match wins, so `'e'` is emergency and `'err'` is error.
 *
 * @example
 * ```typescript
 * severityOrdinal('info')  // 6
 * severityOrdinal('ERR')   // 3
 * severityOrdinal(2)       // 2
 * severityOrdinal('nope')  // throws UnknownSeverityError
 * ```
 */
export function severityOrdinal(input: SeverityInput): number {

    if (typeof input === 'number') {

        return input
    }

    const prefix = input.toLowerCase()
    const index = SEVERITIES.findIndex((name) => name.startsWith(prefix))

    if (index === -1) {

        throw new UnknownSeverityError(input)
    }

    return index
}


/**
 * Get the severity name for an ordinal.
 *
 * @throws UnknownSeverityError for anything outside 0..7, OFF included
 */
export function severityLabel(ordinal: number): SeverityName {

    const name = Number.isInteger(ordinal) ? SEVERITIES[ordinal] : undefined

    if (name === undefined) {

        throw new UnknownSeverityError(ordinal)
    }

    return name
}


/**
 * Resolve a threshold setting.
 *
 * Like {@link severityOrdinal}, but also accepts `'off'` and `-1`
 * for a logger that should do nothing at all.
 */
export function parseThreshold(input: SeverityInput): number {

    if (input === Severity.OFF || (typeof input === 'string' && input.toLowerCase() === 'off')) {

        return Severity.OFF
    }

    const ordinal = severityOrdinal(input)

    // Validate the range; thresholds outside the scale are config mistakes
    severityLabel(ordinal)

    return ordinal
}
