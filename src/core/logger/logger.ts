/**
 * Smart Logger
 *
 * Buffers records per severity and flushes them as CSV rows on demand
 * or when closed. Normally only records at or above the severity
 * threshold are written. Once anything at or above the smart threshold
 * is logged, the whole flush window is written, debug breadcrumbs
 * included, in the order the records were logged.
 *
 * @example
 * ```typescript
 * const logger = await SmartLogger.open('/var/log/app', {
 *     severityThreshold: 'warning',
 *     smartSeverityThreshold: 'error',
 * })
 *
 * logger.debug('cache miss', { key: 'user:7' })  // buffered
 * logger.error('payment failed')                 // escalates the window
 *
 * await logger.flush()  // writes both rows, debug first
 * await logger.close()
 * ```
 */
import { join } from 'node:path'
import { attempt } from '@logosdx/utils'

import { observer } from '../observer.js'
import { InterProcessMutex } from '../lock/index.js'
import { stripTrailingSeparators } from '../shared/index.js'
import { Severity, severityLabel, severityOrdinal, type SeverityInput } from '../severity/index.js'
import { normalizeSettings } from '../config/index.js'
import { ConstructionError } from './errors.js'
import { LogFileManager } from './files.js'
import { buildRecord, serializeRecords } from './formatter.js'
import { SeverityQueues } from './queue.js'
import type {
    LogMessage,
    LogOverrides,
    LogRecord,
    LoggerOptions,
    LoggerSettings,
    LoggerSettingsInput,
    LoggerState,
} from './types.js'
import { NO_DATA } from './types.js'


/**
 * Name of the lock file created in every active log directory.
 */
export const LOCK_FILE_NAME = '.lockfile'


export class SmartLogger {

    #directory: string
    #settings: LoggerSettings
    #captureCallSite: boolean
    #files: LogFileManager | null
    #mutex: InterProcessMutex | null
    #queues = new SeverityQueues()
    #verbose = false
    #sequence = 0
    #state: LoggerState = 'active'

    // Flushes of one logger run one after another, in call order
    #flushChain: Promise<void> = Promise.resolve()
    #closing: Promise<void> | null = null

    private constructor(
        directory: string,
        settings: LoggerSettings,
        options: LoggerOptions,
        files: LogFileManager | null,
        mutex: InterProcessMutex | null,
    ) {

        this.#directory = directory
        this.#settings = settings
        this.#captureCallSite = options.captureCallSite ?? true
        this.#files = files
        this.#mutex = mutex
    }


    /**
     * Open a logger on a directory.
     *
     * Creates the directory, then under the directory lock resolves
     * the active file (rotating on size), opens it and sweeps expired
     * files. With `severityThreshold: 'off'` nothing touches the disk.
     *
     * @param directory - Where log files live
     * @param settings - Overrides for the default settings
     * @param options - Runtime options
     * @throws ConfigError if the settings are invalid
     * @throws ConstructionError if any setup step fails
     */
    static async open(
        directory: string,
        settings: LoggerSettingsInput = {},
        options: LoggerOptions = {},
    ): Promise<SmartLogger> {

        if (typeof directory !== 'string' || directory.trim() === '') {

            throw new ConstructionError(String(directory), 'log directory is required')
        }

        const dir = stripTrailingSeparators(directory)
        const resolved = normalizeSettings(settings)

        if (resolved.severityThreshold === Severity.OFF) {

            return new SmartLogger(dir, resolved, options, null, null)
        }

        const files = new LogFileManager(dir, {
            maxFileSize: resolved.maxFileSize,
            maxDays: resolved.maxDays,
            permission: resolved.defaultPermission,
        })

        const mutex = new InterProcessMutex(join(dir, LOCK_FILE_NAME), {
            retryInterval: options.lockRetryMs,
            waitTimeout: options.lockTimeoutMs,
            mode: resolved.defaultPermission,
        })

        const [, err] = await attempt(async () => {

            await files.ensureDirectory()

            await mutex.withLock(async () => {

                await files.resolveActiveFile()
                await files.open()
                await files.deleteExpired()
            })
        })

        if (err) {

            // The caller never gets a logger to close
            const [, closeErr] = await attempt(() => files.close())

            if (closeErr) {

                observer.emit('error', { source: 'logger', error: closeErr, context: { directory: dir } })
            }

            throw new ConstructionError(dir, err.message, { cause: err })
        }

        observer.emit('logger:opened', { directory: dir, filepath: files.filepath ?? '' })

        return new SmartLogger(dir, resolved, options, files, mutex)
    }


    /**
     * The log directory, without trailing separators.
     */
    get directory(): string {

        return this.#directory
    }


    /**
     * Path of the active log file, or null when the logger is OFF.
     */
    get filepath(): string | null {

        return this.#files?.filepath ?? null
    }


    /**
     * Current lifecycle state.
     */
    get state(): LoggerState {

        return this.#state
    }


    /**
     * Settings in effect, with severities as ordinals.
     */
    get settings(): Readonly<LoggerSettings> {

        return this.#settings
    }


    /**
     * False when the logger was configured OFF.
     */
    get isEnabled(): boolean {

        return this.#settings.severityThreshold !== Severity.OFF
    }


    /**
     * Whether the current flush window has escalated.
     */
    get isVerbose(): boolean {

        return this.#verbose
    }


    /**
     * Number of buffered records waiting for the next flush.
     */
    get pending(): number {

        return this.#queues.size
    }


    /**
     * Buffer a record.
     *
     * Never touches the file system. A severity at or above the smart
     * threshold escalates the current flush window.
     *
     * @param message - Text, or an Error (its stack supplies location and trace)
     * @param severity - Ordinal or name prefix ('err', 'info', ...)
     * @param data - Payload for the data column; omit with NO_DATA
     * @param overrides - Explicit file/line/function, or data
     * @throws UnknownSeverityError for a severity that doesn't resolve
     */
    log(
        message: LogMessage,
        severity: SeverityInput,
        data: unknown = NO_DATA,
        overrides: LogOverrides = {},
    ): void {

        if (this.#state !== 'active' || !this.isEnabled) {

            return
        }

        const ordinal = severityOrdinal(severity)

        // Validates the range before anything changes
        severityLabel(ordinal)

        if (ordinal <= this.#settings.smartSeverityThreshold) {

            this.#verbose = true
        }

        this.#queues.push(buildRecord({
            sequence: this.#sequence++,
            severity: ordinal,
            message,
            data,
            overrides,
            dateFormat: this.#settings.dateFormat,
            captureCallSite: this.#captureCallSite,
        }))
    }

    /**
     * Log at emergency: the system is unusable.
     */
    emergency(message: LogMessage, data: unknown = NO_DATA, overrides: LogOverrides = {}): void {

        this.log(message, Severity.EMERGENCY, data, overrides)
    }

    alert(message: LogMessage, data: unknown = NO_DATA, overrides: LogOverrides = {}): void {

        this.log(message, Severity.ALERT, data, overrides)
    }

    critical(message: LogMessage, data: unknown = NO_DATA, overrides: LogOverrides = {}): void {

        this.log(message, Severity.CRITICAL, data, overrides)
    }

    error(message: LogMessage, data: unknown = NO_DATA, overrides: LogOverrides = {}): void {

        this.log(message, Severity.ERROR, data, overrides)
    }

    warning(message: LogMessage, data: unknown = NO_DATA, overrides: LogOverrides = {}): void {

        this.log(message, Severity.WARNING, data, overrides)
    }

    notice(message: LogMessage, data: unknown = NO_DATA, overrides: LogOverrides = {}): void {

        this.log(message, Severity.NOTICE, data, overrides)
    }

    /** Log at informational. */
    info(message: LogMessage, data: unknown = NO_DATA, overrides: LogOverrides = {}): void {

        this.log(message, Severity.INFORMATIONAL, data, overrides)
    }

    debug(message: LogMessage, data: unknown = NO_DATA, overrides: LogOverrides = {}): void {

        this.log(message, Severity.DEBUG, data, overrides)
    }


    /**
     * Write the current flush window to the log file.
     *
     * The window is taken and the queues reset before writing, so a
     * failed write loses that batch instead of retrying it.
     *
     * @throws LockError if the directory lock can't be acquired
     * @throws WriteError if appending fails (after the lock is released)
     */
    flush(): Promise<void> {

        if (this.#state !== 'active' || !this.isEnabled) {

            return Promise.resolve()
        }

        return this.#flushWindow()
    }


    /**
     * Flush once and close the log file.
     *
     * Records logged once close() has been called are ignored. Idempotent:
     * later calls wait for the first close and do nothing else. The file
     * is closed even when the final flush fails; the flush error is then
     * rethrown.
     */
    close(): Promise<void> {

        if (!this.#closing) {

            this.#state = 'closing'
            this.#closing = this.#close(this.#flushWindow())
        }

        return this.#closing
    }


    async #close(finalFlush: Promise<void>): Promise<void> {

        const [, flushErr] = await attempt(() => finalFlush)

        this.#state = 'closed'

        const [, closeErr] = await attempt(async () => this.#files?.close())

        observer.emit('logger:closed', { directory: this.#directory, filepath: this.filepath })

        if (flushErr) {

            if (closeErr) {

                observer.emit('error', { source: 'logger', error: closeErr, context: { directory: this.#directory } })
            }

            throw flushErr
        }

        if (closeErr) {

            throw closeErr
        }
    }


    /**
     * Take the current window and queue its write behind earlier flushes.
     */
    #flushWindow(): Promise<void> {

        const batch = this.#queues.drain(
            this.#verbose ? Severity.DEBUG : this.#settings.severityThreshold,
        )
        const verbose = this.#verbose

        this.#verbose = false

        const run = this.#flushChain.then(() => this.#write(batch, verbose))

        // Keep the chain alive past a failed flush; the caller still sees the error
        this.#flushChain = run.catch(() => undefined)

        return run
    }


    async #write(batch: readonly LogRecord[], verbose: boolean): Promise<void> {

        const files = this.#files
        const mutex = this.#mutex

        if (batch.length === 0 || !files || !mutex) {

            return
        }

        await mutex.withLock(() => files.append(serializeRecords(batch), batch.length))

        observer.emit('logger:flushed', {
            filepath: files.filepath ?? '',
            count: batch.length,
            verbose,
        })
    }
}
