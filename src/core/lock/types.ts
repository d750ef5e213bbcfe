/**
 * Mutex types.
 *
 * Options for the file-backed lock that serializes log file mutation
 * across processes sharing a log directory.
 */

/**
 * Options for an InterProcessMutex.
 *
 * @example
 * ```typescript
 * // Give up after 5s instead of waiting forever
 * const mutex = new InterProcessMutex('/var/log/app/.lockfile', {
 *     retryInterval: 25,
 *     waitTimeout: 5_000,
 * })
 * ```
 */
export interface MutexOptions {
    /**
     * How often to poll while another holder owns the lock, in milliseconds.
     * @default 10
     */
    retryInterval?: number;

    /**
     * Max time to wait for the lock in milliseconds.
     *
     * Undefined waits until the lock becomes available.
     * @default undefined
     */
    waitTimeout?: number;

    /**
     * File mode used when the lock file is first created.
     * @default 0o777
     */
    mode?: number;
}

/**
 * Default mutex options.
 */
export const DEFAULT_MUTEX_OPTIONS = {
    retryInterval: 10,
    mode: 0o777,
} as const;

/**
 * Suffix of the ownership token that sits beside the lock file.
 */
export const OWNER_SUFFIX = '.owner';

/**
 * Suffix of the guard file held while a stale token is checked and removed.
 */
export const GUARD_SUFFIX = '.guard';
