/**
 * File system utilities.
 *
 * Cross-cutting helpers used by the lock and logger modules.
 */


/**
 * Check whether an error is a Node errno error with the given code.
 *
 * @example
 * ```typescript
 * const [, err] = await attempt(() => stat(filepath))
 * if (err && isErrnoCode(err, 'ENOENT')) {
 *     // file is missing
 * }
 * ```
 */
export function isErrnoCode(error: unknown, code: string): boolean {

    return error instanceof Error && 'code' in error && error.code === code
}


/**
 * Remove trailing path separators (both `/` and `\`).
 *
 * A bare root (`/`) is kept as-is so it still names a directory.
 */
export function stripTrailingSeparators(dirpath: string): string {

    const stripped = dirpath.replace(/[\\/]+$/, '')

    return stripped === '' && dirpath !== '' ? dirpath.slice(0, 1) : stripped
}


/**
 * Check if a process is still running.
 *
 * Signal 0 performs the existence check without delivering anything.
 * EPERM means the process exists but belongs to someone else.
 */
export function isProcessRunning(pid: number): boolean {

    try {

        process.kill(pid, 0)
        return true
    }
    catch (error) {

        return isErrnoCode(error, 'EPERM')
    }
}


/**
 * Sleep for the given number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {

    return new Promise((resolve) => setTimeout(resolve, ms))
}
