/**
 * Configuration errors.
 */
import type { z } from 'zod'


/**
 * Error when logger or registry configuration is invalid.
 *
 * Carries the first failing field for quick reporting and every zod
 * issue for callers that want the whole picture.
 *
 * @example
 * ```typescript
 * const [, err] = attemptSync(() => parseRegistryConfig(input))
 * if (err instanceof ConfigError) {
 *     console.error(`${err.field}: ${err.message}`)
 * }
 * ```
 */
export class ConfigError extends Error {

    override readonly name = 'ConfigError' as const

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[] = [],
    ) {

        super(message)
    }
}
