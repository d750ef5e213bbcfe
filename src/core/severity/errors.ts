/**
 * Severity resolution errors.
 */


/**
 * Error when a severity name or ordinal cannot be resolved.
 *
 * Raised for typos in severity names and out-of-range ordinals.
 *
 * @example
 * ```typescript
 * const [, err] = attemptSync(() => severityOrdinal('bogus'))
 * if (err instanceof UnknownSeverityError) {
 *     console.log(`Bad severity: ${err.input}`)
 * }
 * ```
 */
export class UnknownSeverityError extends Error {

    override readonly name = 'UnknownSeverityError' as const

    constructor(
        public readonly input: string | number,
    ) {

        super(`Unknown severity: ${String(input)}`)
    }
}
