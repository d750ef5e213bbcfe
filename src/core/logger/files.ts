/**
 * Log File Manager
 *
 * Owns one log directory: creates it, picks the active file (rotating
 * on size), sweeps expired files and keeps an append handle open for
 * the lifetime of a logger. Callers are expected to hold the directory
 * lock around everything except ensureDirectory() and close().
 *
 * @example
 * ```typescript
 * const files = new LogFileManager('/var/log/app', {
 *     maxFileSize: 10_000_000,
 *     maxDays: 7,
 *     permission: 0o755,
 * })
 *
 * await files.ensureDirectory()
 * await mutex.withLock(async () => {
 *     await files.resolveActiveFile()
 *     await files.open()
 *     await files.deleteExpired()
 * })
 *
 * await files.append('2024-01-15 10:30:00.000,ERROR,Disk full,app.ts(12),,\n')
 * await files.close()
 * ```
 */
import { mkdir, open, type FileHandle } from 'node:fs/promises'
import { attempt } from '@logosdx/utils'

import { LoggerIOError, WriteError } from './errors.js'
import { deleteExpired, resolveActiveFile } from './rotation.js'


/**
 * Rotation and retention policy for a LogFileManager.
 */
export interface LogFilePolicy {
    /** Rotate once the active file is larger than this (bytes) */
    maxFileSize: number;

    /** Delete files dated more than this many days ago */
    maxDays: number;

    /** Mode for the created directory and files */
    permission: number;
}


export class LogFileManager {

    #directory: string
    #policy: LogFilePolicy
    #filepath: string | null = null
    #handle: FileHandle | null = null

    constructor(directory: string, policy: LogFilePolicy) {

        this.#directory = directory
        this.#policy = policy
    }


    /**
     * The managed log directory.
     */
    get directory(): string {

        return this.#directory
    }


    /**
     * Path of the active file, once resolved.
     */
    get filepath(): string | null {

        return this.#filepath
    }


    /**
     * Whether an append handle is open.
     */
    get isOpen(): boolean {

        return this.#handle !== null
    }


    /**
     * Create the log directory (and parents) if missing.
     *
     * @throws LoggerIOError if the directory cannot be created
     */
    async ensureDirectory(): Promise<void> {

        const [, err] = await attempt(() =>
            mkdir(this.#directory, { recursive: true, mode: this.#policy.permission })
        )

        if (err) {

            throw new LoggerIOError(this.#directory, 'mkdir', { cause: err })
        }
    }


    /**
     * Pick the file to append to, rotating past oversized ones.
     *
     * @throws PermissionError if the chosen file exists but isn't writable
     */
    async resolveActiveFile(now: Date = new Date()): Promise<string> {

        this.#filepath = await resolveActiveFile(this.#directory, this.#policy.maxFileSize, now)

        return this.#filepath
    }


    /**
     * Open the active file for appending.
     *
     * Resolves the active file first if that hasn't happened yet.
     *
     * @throws LoggerIOError if the file cannot be opened
     */
    async open(): Promise<void> {

        if (this.#handle) {

            return
        }

        const filepath = this.#filepath ?? await this.resolveActiveFile()

        const [handle, err] = await attempt(() => open(filepath, 'a', this.#policy.permission))

        if (err) {

            throw new LoggerIOError(filepath, 'open', { cause: err })
        }

        this.#handle = handle
    }


    /**
     * Append text to the active file.
     *
     * @param text - Serialized rows
     * @param count - Number of records in `text`, for error reporting
     * @throws WriteError if nothing is open or the write fails
     */
    async append(text: string, count = 0): Promise<void> {

        const handle = this.#handle
        const filepath = this.#filepath ?? this.#directory

        if (!handle) {

            throw new WriteError(filepath, count, { cause: new Error('log file is not open') })
        }

        const [, err] = await attempt(() => handle.appendFile(text, 'utf-8'))

        if (err) {

            throw new WriteError(filepath, count, { cause: err })
        }
    }


    /**
     * Delete log files older than the retention window.
     *
     * @returns Paths of the deleted files
     */
    async deleteExpired(now: Date = new Date()): Promise<string[]> {

        return deleteExpired(this.#directory, this.#policy.maxDays, now)
    }


    /**
     * Close the append handle. Safe to call more than once.
     *
     * @throws LoggerIOError if the handle fails to close
     */
    async close(): Promise<void> {

        const handle = this.#handle

        if (!handle) {

            return
        }

        this.#handle = null

        const [, err] = await attempt(() => handle.close())

        if (err) {

            throw new LoggerIOError(this.#filepath ?? this.#directory, 'close', { cause: err })
        }
    }
}
