/**
 * Inter-process mutex backed by a lock file.
 *
 * The lock file itself (`.lockfile` in the log directory) is a
 * human-readable status marker holding `Locked` or `Unlocked`.
 * Ownership is a sibling token file created with O_EXCL, so exactly one
 * holder (in any process) can create it at a time. The token records
 * the holder's PID; a token left behind by a dead process is removed on
 * the next acquisition attempt. Removal happens under a second O_EXCL
 * guard file, and the token is re-read there, so only a token that
 * still names the dead process is ever deleted.
 *
 * @example
 * ```typescript
 * const mutex = new InterProcessMutex('/var/log/app/.lockfile')
 *
 * await mutex.acquire()
 * try {
 *     await rotateAndAppend()
 * }
 * finally {
 *     await mutex.release()
 * }
 * ```
 */
import { readFile, unlink, writeFile } from 'node:fs/promises'
import { attempt } from '@logosdx/utils'

import { observer } from '../observer.js'
import { isErrnoCode, isProcessRunning, sleep } from '../shared/index.js'
import { LockError } from './errors.js'
import type { MutexOptions } from './types.js'
import { DEFAULT_MUTEX_OPTIONS, GUARD_SUFFIX, OWNER_SUFFIX } from './types.js'


/**
 * Exclusive lock shared by every process pointing at the same lock file.
 */
export class InterProcessMutex {

    #lockfile: string
    #ownerfile: string
    #guardfile: string
    #retryInterval: number
    #waitTimeout: number | undefined
    #mode: number
    #held = false

    constructor(lockfile: string, options: MutexOptions = {}) {

        this.#lockfile = lockfile
        this.#ownerfile = `${lockfile}${OWNER_SUFFIX}`
        this.#guardfile = `${this.#ownerfile}${GUARD_SUFFIX}`
        this.#retryInterval = options.retryInterval ?? DEFAULT_MUTEX_OPTIONS.retryInterval
        this.#waitTimeout = options.waitTimeout
        this.#mode = options.mode ?? DEFAULT_MUTEX_OPTIONS.mode
    }


    /**
     * Path of the status marker file.
     */
    get lockfile(): string {

        return this.#lockfile
    }


    /**
     * Whether this mutex currently holds the lock.
     */
    get isHeld(): boolean {

        return this.#held
    }


    /**
     * Acquire the lock, waiting until it becomes available.
     *
     * @throws LockError if the lock file is not writable, the token cannot
     * be created, the mutex is already held, or waitTimeout elapses
     */
    async acquire(): Promise<void> {

        if (this.#held) {

            throw new LockError(this.#lockfile, 'already held by this mutex')
        }

        const startTime = Date.now()

        while (true) {

            const [, err] = await attempt(() =>
                writeFile(this.#ownerfile, String(process.pid), { flag: 'wx', mode: this.#mode })
            )

            if (!err) {

                break
            }

            if (!isErrnoCode(err, 'EEXIST')) {

                throw new LockError(this.#lockfile, `cannot create lock token: ${err.message}`, { cause: err })
            }

            if (await this.#clearStale()) {

                continue
            }

            const elapsed = Date.now() - startTime

            if (this.#waitTimeout !== undefined && elapsed >= this.#waitTimeout) {

                throw new LockError(this.#lockfile, `timed out after ${this.#waitTimeout}ms`)
            }

            await sleep(this.#retryInterval)
        }

        this.#held = true

        // The marker write doubles as the writability check on the lock file
        const [, markErr] = await attempt(() => this.#mark('Locked'))

        if (markErr) {

            await this.#dropToken()

            throw new LockError(this.#lockfile, `lock file is not writable: ${markErr.message}`, { cause: markErr })
        }

        observer.emit('lock:acquired', {
            lockfile: this.#lockfile,
            waitedMs: Date.now() - startTime,
        })
    }


    /**
     * Release the lock.
     *
     * Releasing a lock this mutex does not hold is caller misuse rather
     * than a system failure: it emits `lock:warning` and returns.
     *
     * @throws LockError if the marker or token cannot be updated
     */
    async release(): Promise<void> {

        if (!this.#held) {

            observer.emit('lock:warning', {
                lockfile: this.#lockfile,
                message: 'release called without holding the lock',
            })

            return
        }

        const [, markErr] = await attempt(() => this.#mark('Unlocked'))
        const tokenErr = await this.#dropToken()

        const err = tokenErr ?? markErr

        if (err) {

            throw new LockError(this.#lockfile, `release failed: ${err.message}`, { cause: err })
        }

        observer.emit('lock:released', { lockfile: this.#lockfile })
    }


    /**
     * Execute an operation while holding the lock.
     *
     * The lock is released even if the operation throws. When both the
     * operation and the release fail, the operation's error wins and the
     * release failure is reported on the observer.
     *
     * @example
     * ```typescript
     * const deleted = await mutex.withLock(() => files.deleteExpired(new Date()))
     * ```
     */
    async withLock<T>(operation: () => Promise<T>): Promise<T> {

        await this.acquire()

        let result: T

        try {

            result = await operation()
        }
        catch (opErr) {

            const [, releaseErr] = await attempt(() => this.release())

            if (releaseErr) {

                observer.emit('error', {
                    source: 'lock',
                    error: releaseErr,
                    context: { lockfile: this.#lockfile },
                })
            }

            throw opErr
        }

        await this.release()

        return result
    }


    /**
     * Remove the ownership token if its holder is gone.
     *
     * Only one waiter at a time may check and remove, under the guard
     * file. A waiter that finds the guard taken just retries later.
     *
     * @returns true when the token is gone and creation should be retried
     */
    async #clearStale(): Promise<boolean> {

        const [, guardErr] = await attempt(() =>
            writeFile(this.#guardfile, String(process.pid), { flag: 'wx', mode: this.#mode })
        )

        if (guardErr) {

            if (isErrnoCode(guardErr, 'EEXIST')) {

                return false
            }

            throw new LockError(this.#lockfile, `cannot create stale guard: ${guardErr.message}`, { cause: guardErr })
        }

        const [cleared, err] = await attempt(() => this.#removeDeadToken())
        const [, unguardErr] = await attempt(() => unlink(this.#guardfile))

        if (err) {

            throw err
        }

        if (unguardErr && !isErrnoCode(unguardErr, 'ENOENT')) {

            throw new LockError(this.#lockfile, `cannot remove stale guard: ${unguardErr.message}`, { cause: unguardErr })
        }

        return cleared === true
    }


    /**
     * Re-read the token under the guard and delete it if its PID is dead.
     */
    async #removeDeadToken(): Promise<boolean> {

        const [content, readErr] = await attempt(() => readFile(this.#ownerfile, 'utf-8'))

        if (readErr) {

            // Released since our create attempt: just retry
            return isErrnoCode(readErr, 'ENOENT')
        }

        const pid = Number.parseInt(content, 10)

        // Empty while the holder is still writing its PID
        if (!Number.isInteger(pid) || pid <= 0 || isProcessRunning(pid)) {

            return false
        }

        const [, unlinkErr] = await attempt(() => unlink(this.#ownerfile))

        if (unlinkErr && !isErrnoCode(unlinkErr, 'ENOENT')) {

            throw new LockError(this.#lockfile, `cannot remove stale token: ${unlinkErr.message}`, { cause: unlinkErr })
        }

        observer.emit('lock:stale', { lockfile: this.#lockfile, pid })

        return true
    }


    /**
     * Truncate the lock file and write a status marker.
     */
    async #mark(status: 'Locked' | 'Unlocked'): Promise<void> {

        await writeFile(this.#lockfile, `${status}\n`, { mode: this.#mode })
    }


    /**
     * Delete the ownership token and clear the held flag.
     */
    async #dropToken(): Promise<Error | null> {

        this.#held = false

        const [, err] = await attempt(() => unlink(this.#ownerfile))

        return err && !isErrnoCode(err, 'ENOENT') ? err : null
    }
}
