/**
 * Logger Registry
 *
 * An explicit, application-owned collection of named loggers. The
 * application creates it once at startup, passes it to whatever needs
 * a logger, and closes it on shutdown.
 *
 * @example
 * ```typescript
 * const registry = await LoggerRegistry.configure({
 *     default: ['/var/log/app'],
 *     audit: ['/var/log/audit', { severityThreshold: 'notice', maxDays: 30 }],
 * })
 *
 * registry.get('audit')?.notice('user signed in', { id: 7 })
 *
 * await registry.closeAll()
 * ```
 */
import { attempt } from '@logosdx/utils'

import { observer } from '../observer.js'
import {
    ConfigError,
    parseRegistryConfig,
    type RegistryConfigInput,
    type RegistryEntry,
} from '../config/index.js'
import { SmartLogger } from '../logger/logger.js'
import type { LoggerOptions } from '../logger/types.js'


export class LoggerRegistry {

    #loggers = new Map<string, SmartLogger>()

    // Names claimed by a configure() call that is still opening loggers
    #reserved = new Set<string>()
    #options: LoggerOptions

    constructor(options: LoggerOptions = {}) {

        this.#options = options
    }


    /**
     * Create a registry and open every configured logger.
     *
     * @param input - Logger name -> [directory, settings?]
     * @param options - Runtime options applied to every logger
     * @throws ConfigError for invalid input
     * @throws ConstructionError if any logger fails to open
     */
    static async configure(
        input: RegistryConfigInput | Map<string, RegistryEntry>,
        options: LoggerOptions = {},
    ): Promise<LoggerRegistry> {

        const registry = new LoggerRegistry(options)

        await registry.configure(input)

        return registry
    }


    /**
     * Names of all registered loggers.
     */
    get names(): string[] {

        return [...this.#loggers.keys()]
    }


    /**
     * Open and register a batch of loggers.
     *
     * All or nothing: if any logger fails to open, the ones opened by
     * this call are closed again and none of them are registered. Names
     * are claimed before opening starts, so overlapping calls can't
     * register the same name twice.
     *
     * @param input - Raw input, or entries from parseRegistryConfig/loadRegistryConfig
     * @throws ConfigError for invalid input or a name that's already registered
     * @throws ConstructionError if any logger fails to open
     */
    async configure(input: RegistryConfigInput | Map<string, RegistryEntry>): Promise<void> {

        const entries = input instanceof Map ? input : parseRegistryConfig(input)

        for (const name of entries.keys()) {

            if (this.#loggers.has(name) || this.#reserved.has(name)) {

                throw new ConfigError(`Logger '${name}' is already registered`, name)
            }
        }

        for (const name of entries.keys()) {

            this.#reserved.add(name)
        }

        const [, err] = await attempt(() => this.#openAll(entries))

        for (const name of entries.keys()) {

            this.#reserved.delete(name)
        }

        if (err) {

            throw err
        }
    }


    /**
     * Look up a logger by name.
     *
     * @returns The logger, or undefined for an unknown name
     */
    get(name = 'default'): SmartLogger | undefined {

        return this.#loggers.get(name)
    }


    /**
     * Check whether a logger is registered.
     */
    has(name: string): boolean {

        return this.#loggers.has(name)
    }


    /**
     * Flush every logger.
     *
     * All loggers are flushed even if some fail; the first failure is
     * rethrown afterwards.
     */
    async flushAll(): Promise<void> {

        await this.#each((logger) => logger.flush())
    }


    /**
     * Close every logger and empty the registry.
     *
     * All loggers are closed even if some fail; the first failure is
     * rethrown afterwards.
     */
    async closeAll(): Promise<void> {

        const loggers = [...this.#loggers.values()]

        this.#loggers.clear()

        await this.#each((logger) => logger.close(), loggers)
    }


    async #openAll(entries: Map<string, RegistryEntry>): Promise<void> {

        const opened = new Map<string, SmartLogger>()

        for (const [name, entry] of entries) {

            const [logger, err] = await attempt(() => this.#open(entry))

            if (err) {

                await this.#discard(opened)
                throw err
            }

            opened.set(name, logger)
        }

        for (const [name, logger] of opened) {

            this.#loggers.set(name, logger)
        }
    }


    async #open(entry: RegistryEntry): Promise<SmartLogger> {

        return SmartLogger.open(entry.directory, entry.settings, this.#options)
    }


    async #discard(opened: Map<string, SmartLogger>): Promise<void> {

        for (const [name, logger] of opened) {

            const [, err] = await attempt(() => logger.close())

            if (err) {

                observer.emit('error', { source: 'registry', error: err, context: { logger: name } })
            }
        }
    }


    async #each(
        fn: (logger: SmartLogger) => Promise<void>,
        loggers: SmartLogger[] = [...this.#loggers.values()],
    ): Promise<void> {

        let first: Error | null = null

        for (const logger of loggers) {

            const [, err] = await attempt(() => fn(logger))

            if (err && !first) {

                first = err
            }
        }

        if (first) {

            throw first
        }
    }
}
