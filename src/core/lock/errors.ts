/**
 * Lock-related errors.
 *
 * WHY: Callers flushing logs need to tell a lock failure apart from a
 * failed write, even though both surface from the same flush() call.
 */


/**
 * Error when the inter-process lock cannot be acquired or released.
 *
 * Thrown when the lock file cannot be opened for writing, when the
 * ownership token cannot be created or removed, or when an optional
 * wait timeout is exceeded.
 *
 * @example
 * ```typescript
 * const [, err] = await attempt(() => mutex.acquire())
 * if (err instanceof LockError) {
 *     console.log(`Could not lock ${err.lockfile}: ${err.reason}`)
 * }
 * ```
 */
export class LockError extends Error {

    override readonly name = 'LockError' as const

    constructor(
        public readonly lockfile: string,
        public readonly reason: string,
        options?: ErrorOptions,
    ) {

        super(`Could not lock ${lockfile}: ${reason}`, options)
    }
}
