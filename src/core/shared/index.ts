/**
 * Shared module exports.
 *
 * Cross-cutting helpers used by multiple core modules.
 */
export {
    isErrnoCode,
    stripTrailingSeparators,
    isProcessRunning,
    sleep,
} from './files.js'
