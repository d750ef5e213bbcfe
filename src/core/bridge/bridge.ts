/**
 * Error Bridge
 *
 * Forwards process-wide failure notifications into a registry logger.
 * The loggers know nothing about this: the bridge subscribes to the
 * process, classifies each notification and calls the logger's plain
 * `log()` entry point, taking file/line from the error's own stack.
 *
 * @example
 * ```typescript
 * const bridge = new ErrorBridge(registry, { logger: 'errors', display: true })
 * const cleanup = bridge.install()
 *
 * // Later: remove the process listeners
 * cleanup()
 * ```
 */
import { attempt } from '@logosdx/utils'

import { observer } from '../observer.js'
import { Severity, severityLabel } from '../severity/index.js'
import type { LoggerRegistry } from '../registry/index.js'
import type { SmartLogger } from '../logger/logger.js'
import { errorOrigin } from '../logger/callsite.js'
import type {
    CleanupFn,
    ErrorBridgeOptions,
    NotificationClass,
    NotificationKind,
} from './types.js'
import { ALL_NOTIFICATIONS } from './types.js'


/**
 * Severity for each notification class.
 */
const SEVERITY_BY_CLASS: Record<NotificationClass, number> = {
    fatal: Severity.EMERGENCY,
    error: Severity.ALERT,
    warning: Severity.WARNING,
    notice: Severity.NOTICE,
    unrecognized: Severity.WARNING,
}

/**
 * Known process warning names.
 */
const WARNING_CLASSES: Record<string, NotificationClass> = {
    Warning: 'warning',
    DeprecationWarning: 'warning',
    MaxListenersExceededWarning: 'warning',
    TimeoutOverflowWarning: 'warning',
    UnsupportedWarning: 'warning',
    ExperimentalWarning: 'notice',
}


/**
 * Map a notification class to a severity ordinal.
 *
 * @example
 * ```typescript
 * severityForNotification('fatal')         // 0 (emergency)
 * severityForNotification('error')         // 1 (alert)
 * severityForNotification('unrecognized')  // 4 (warning)
 * ```
 */
export function severityForNotification(cls: NotificationClass): number {

    return SEVERITY_BY_CLASS[cls]
}


/**
 * Classify a process warning by its name.
 */
export function classifyWarning(warning: Error): NotificationClass {

    return WARNING_CLASSES[warning.name] ?? 'unrecognized'
}


export class ErrorBridge {

    #registry: LoggerRegistry
    #loggerName: string
    #capture: NotificationKind[]
    #display: boolean
    #exitOnException: boolean
    #cleanup: CleanupFn | null = null

    constructor(registry: LoggerRegistry, options: ErrorBridgeOptions = {}) {

        this.#registry = registry
        this.#loggerName = options.logger ?? 'default'
        this.#capture = options.capture ?? [...ALL_NOTIFICATIONS]
        this.#display = options.display ?? false
        this.#exitOnException = options.exitOnException ?? true
    }


    /**
     * Whether process listeners are currently registered.
     */
    get isInstalled(): boolean {

        return this.#cleanup !== null
    }


    /**
     * Subscribe to the configured process notifications.
     *
     * Installing twice replaces the earlier listeners.
     *
     * @returns Cleanup function that removes the listeners
     */
    install(): CleanupFn {

        this.uninstall()

        const exceptionHandler = (error: Error) => {

            void this.handleException(error)
        }

        const rejectionHandler = (reason: unknown) => {

            void this.handleRejection(reason)
        }

        const warningHandler = (warning: Error) => {

            void this.handleWarning(warning)
        }

        const exitHandler = () => {

            void this.handleExit()
        }

        const capture = new Set(this.#capture)

        if (capture.has('exception')) {

            process.on('uncaughtException', exceptionHandler)
        }

        if (capture.has('rejection')) {

            process.on('unhandledRejection', rejectionHandler)
        }

        if (capture.has('warning')) {

            process.on('warning', warningHandler)
        }

        if (capture.has('exit')) {

            process.on('beforeExit', exitHandler)
        }

        this.#cleanup = () => {

            process.removeListener('uncaughtException', exceptionHandler)
            process.removeListener('unhandledRejection', rejectionHandler)
            process.removeListener('warning', warningHandler)
            process.removeListener('beforeExit', exitHandler)
        }

        observer.emit('bridge:installed', {
            logger: this.#loggerName,
            capture: [...capture],
        })

        return () => this.uninstall()
    }


    /**
     * Remove the process listeners, if installed.
     */
    uninstall(): void {

        if (this.#cleanup) {

            this.#cleanup()
            this.#cleanup = null
        }
    }


    /**
     * Log an uncaught exception and flush it immediately.
     *
     * Classified fatal when the bridge will end the process, error
     * otherwise. Never rejects: failures are reported on the observer.
     */
    async handleException(error: unknown): Promise<void> {

        const cls: NotificationClass = this.#exitOnException ? 'fatal' : 'error'

        await this.#forward('exception', cls, toError(error), true)

        if (this.#exitOnException) {

            process.exit(1)
        }
    }


    /**
     * Log an unhandled rejection and flush it immediately.
     */
    async handleRejection(reason: unknown): Promise<void> {

        await this.#forward('rejection', 'error', toError(reason), true)
    }


    /**
     * Log a process warning. It is buffered like any other record.
     */
    async handleWarning(warning: Error): Promise<void> {

        await this.#forward('warning', classifyWarning(warning), warning, false)
    }


    /**
     * Flush the target logger as the process winds down.
     *
     * Runs on beforeExit, which fires once the event loop is empty but
     * not on an explicit process.exit(). An empty flush does no I/O, so
     * the loop stays empty and the process can end.
     */
    async handleExit(): Promise<void> {

        const logger = this.#target()

        if (!logger) {

            return
        }

        const [, err] = await attempt(() => logger.flush())

        if (err) {

            observer.emit('error', {
                source: 'bridge',
                error: err,
                context: { logger: this.#loggerName, kind: 'exit' },
            })
        }
    }


    async #forward(
        kind: NotificationKind,
        cls: NotificationClass,
        error: Error,
        flush: boolean,
    ): Promise<void> {

        if (this.#display) {

            console.error(error)
        }

        const logger = this.#target()

        if (!logger) {

            return
        }

        const severity = severityForNotification(cls)

        const [, logErr] = await attempt(async () => {

            if (cls === 'unrecognized') {

                const origin = errorOrigin(error)

                logger.log(
                    `Unknown notification type (${error.name})`,
                    severity,
                    error.message,
                    { file: origin?.file ?? '', line: origin?.line ?? undefined },
                )
            }
            else {

                logger.log(error, severity)
            }

            if (flush) {

                await logger.flush()
            }
        })

        if (logErr) {

            observer.emit('error', {
                source: 'bridge',
                error: logErr,
                context: { logger: this.#loggerName, kind },
            })

            return
        }

        observer.emit('bridge:captured', {
            logger: this.#loggerName,
            kind,
            severity: severityLabel(severity),
        })
    }


    #target(): SmartLogger | undefined {

        const logger = this.#registry.get(this.#loggerName)

        if (!logger) {

            observer.emit('error', {
                source: 'bridge',
                error: new Error(`Logger '${this.#loggerName}' is not registered`),
            })
        }

        return logger
    }
}


function toError(value: unknown): Error {

    return value instanceof Error ? value : new Error(String(value))
}
