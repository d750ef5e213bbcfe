/**
 * Logger errors.
 *
 * WHY: Construction failures must keep a logger out of the registry,
 * while flush failures are surfaced to the caller after the directory
 * lock is released. Separate types let callers tell them apart.
 */


/**
 * Error when a logger cannot be opened.
 *
 * Wraps whatever failed during setup (directory, lock, file, retention)
 * as `cause`. A logger that throws this is never usable.
 *
 * @example
 * ```typescript
 * const [logger, err] = await attempt(() => SmartLogger.open('/var/log/app'))
 * if (err instanceof ConstructionError) {
 *     console.error(`Logging disabled: ${err.message}`)
 * }
 * ```
 */
export class ConstructionError extends Error {

    override readonly name = 'ConstructionError' as const

    constructor(
        public readonly directory: string,
        reason: string,
        options?: ErrorOptions,
    ) {

        super(`Cannot open logger for ${directory}: ${reason}`, options)
    }
}


/**
 * Error when the log directory or file cannot be created or opened.
 */
export class LoggerIOError extends Error {

    override readonly name = 'LoggerIOError' as const

    constructor(
        public readonly path: string,
        public readonly operation: 'mkdir' | 'open' | 'close',
        options?: ErrorOptions,
    ) {

        const cause = options?.cause instanceof Error ? `: ${options.cause.message}` : ''

        super(`Failed to ${operation} ${path}${cause}`, options)
    }
}


/**
 * Error when an existing log file is not writable.
 */
export class PermissionError extends Error {

    override readonly name = 'PermissionError' as const

    constructor(
        public readonly path: string,
        options?: ErrorOptions,
    ) {

        super(`Cannot write to log file. Please check permissions on: ${path}`, options)
    }
}


/**
 * Error when appending a flushed batch fails.
 *
 * The batch is lost; nothing is retried.
 *
 * @example
 * ```typescript
 * const [, err] = await attempt(() => logger.flush())
 * if (err instanceof WriteError) {
 *     console.error(`Dropped ${err.count} records`)
 * }
 * ```
 */
export class WriteError extends Error {

    override readonly name = 'WriteError' as const

    constructor(
        public readonly path: string,
        public readonly count: number,
        options?: ErrorOptions,
    ) {

        const cause = options?.cause instanceof Error ? `: ${options.cause.message}` : ''

        super(`Failed to write ${count} records to ${path}${cause}`, options)
    }
}
