/**
 * Log Rotation
 *
 * Naming, size-based rotation and age-based retention for log files.
 * Files are named `log_<YYYY-MM-DD>-<NNN>.csv`, where NNN counts up
 * from 000 within a calendar day each time the previous file grows past
 * the size cap. Rotation is decided when a logger opens, not per write.
 */
import { access, readdir, stat, unlink } from 'node:fs/promises'
import { constants } from 'node:fs'
import { join } from 'node:path'
import dayjs from 'dayjs'
import { attempt } from '@logosdx/utils'

import { observer } from '../observer.js'
import { isErrnoCode } from '../shared/index.js'
import { PermissionError } from './errors.js'


/**
 * Matches log file names; the date group feeds retention.
 */
export const LOG_FILE_PATTERN = /^log_(?<date>\d{4}-\d{2}-\d{2})(-\d+)?\.csv$/

const SECONDS_PER_DAY = 24 * 60 * 60


/**
 * Parse a size string (e.g., '10mb', '1gb') to bytes.
 *
 * @param size - Byte count, or size string with unit suffix
 * @returns Size in bytes
 *
 * @example
 * ```typescript
 * parseSize('10mb')  // 10485760
 * parseSize('1gb')   // 1073741824
 * parseSize(512)     // 512
 * ```
 */
export function parseSize(size: string | number): number {

    if (typeof size === 'number') {

        if (!Number.isFinite(size) || size < 0) {

            throw new Error(`Invalid size: ${size}`)
        }

        return Math.floor(size)
    }

    const match = size.toLowerCase().match(/^(\d+(?:\.\d+)?)\s*(b|kb|mb|gb)?$/)

    if (!match || !match[1]) {

        throw new Error(`Invalid size format: ${size}`)
    }

    const value = parseFloat(match[1])
    const unit = match[2] ?? 'b'

    const multipliers: Record<string, number> = {
        b: 1,
        kb: 1024,
        mb: 1024 * 1024,
        gb: 1024 * 1024 * 1024,
    }

    const multiplier = multipliers[unit]

    if (multiplier === undefined) {

        throw new Error(`Invalid size unit: ${unit}`)
    }

    return Math.floor(value * multiplier)
}


/**
 * Generate the file name for a day and rotation counter.
 *
 * @example
 * ```typescript
 * logFileName(new Date(2024, 0, 15), 2)  // 'log_2024-01-15-002.csv'
 * ```
 */
export function logFileName(day: Date, counter: number): string {

    const date = dayjs(day).format('YYYY-MM-DD')

    return `log_${date}-${String(counter).padStart(3, '0')}.csv`
}


/**
 * Find the file new records should be appended to.
 *
 * Starts at counter 000 for `now`'s calendar day and moves on while the
 * candidate exists and is strictly larger than `maxFileSize`.
 *
 * @returns Absolute path of the active file (may not exist yet)
 * @throws PermissionError if the chosen file exists but isn't writable
 */
export async function resolveActiveFile(
    directory: string,
    maxFileSize: number,
    now: Date = new Date(),
): Promise<string> {

    let counter = 0
    let filepath = join(directory, logFileName(now, counter))

    while (true) {

        const [stats, err] = await attempt(() => stat(filepath))

        if (err || stats.size <= maxFileSize) {

            break
        }

        counter++
        filepath = join(directory, logFileName(now, counter))
    }

    if (counter > 0) {

        observer.emit('logger:rotated', {
            directory,
            from: join(directory, logFileName(now, counter - 1)),
            to: filepath,
        })
    }

    const [, accessErr] = await attempt(() => access(filepath, constants.W_OK))

    if (accessErr && !isErrnoCode(accessErr, 'ENOENT')) {

        throw new PermissionError(filepath, { cause: accessErr })
    }

    return filepath
}


/**
 * List log files in a directory with the date embedded in their name.
 *
 * Names that don't match the log pattern, or whose date doesn't parse,
 * are left out.
 */
export async function listLogFiles(directory: string): Promise<Array<{ filepath: string; date: Date }>> {

    const entries = await readdir(directory)
    const files: Array<{ filepath: string; date: Date }> = []

    for (const name of entries.sort()) {

        const date = LOG_FILE_PATTERN.exec(name)?.groups?.['date']

        if (!date) {

            continue
        }

        const parsed = dayjs(date)

        if (!parsed.isValid()) {

            continue
        }

        files.push({ filepath: join(directory, name), date: parsed.toDate() })
    }

    return files
}


/**
 * Delete log files dated before the retention cutoff.
 *
 * The cutoff is `now - maxDays` days; a file is deleted only when its
 * date is strictly older, so a file dated exactly at the cutoff stays.
 *
 * @returns Paths of the deleted files
 *
 * @example
 * ```typescript
 * // now = 2024-01-15 00:00, maxDays = 7 -> cutoff 2024-01-08 00:00
 * await deleteExpired('/logs', 7, now)
 * // ['/logs/log_2024-01-07-000.csv']
 * ```
 */
export async function deleteExpired(
    directory: string,
    maxDays: number,
    now: Date = new Date(),
): Promise<string[]> {

    const cutoff = now.getTime() - maxDays * SECONDS_PER_DAY * 1000
    const deleted: string[] = []

    for (const { filepath, date } of await listLogFiles(directory)) {

        if (date.getTime() >= cutoff) {

            continue
        }

        const [, err] = await attempt(() => unlink(filepath))

        // Another process sweeping the same directory may have beaten us to it
        if (err) {

            if (isErrnoCode(err, 'ENOENT')) {

                continue
            }

            throw err
        }

        deleted.push(filepath)
        observer.emit('logger:expired', { filepath })
    }

    return deleted
}
