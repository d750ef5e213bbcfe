/**
 * Lock module exports.
 *
 * Provides the inter-process mutex guarding log file creation,
 * rotation, append and retention deletes.
 *
 * @example
 * ```typescript
 * import { InterProcessMutex, LockError } from './lock'
 *
 * const mutex = new InterProcessMutex(join(directory, '.lockfile'))
 *
 * // Use withLock for automatic release
 * await mutex.withLock(async () => {
 *     await appendRows()
 * })
 * ```
 */

// Types
export type { MutexOptions } from './types.js';

export { DEFAULT_MUTEX_OPTIONS, GUARD_SUFFIX, OWNER_SUFFIX } from './types.js';

// Errors
export { LockError } from './errors.js';

// Mutex
export { InterProcessMutex } from './mutex.js';
