/**
 * Logger Module
 *
 * Buffered CSV loggers with smart escalation, size rotation and
 * day-based retention.
 */

// Types
export type {
    NoData,
    LoggerSettings,
    LoggerSettingsInput,
    LoggerOptions,
    LogOverrides,
    LogMessage,
    LogRecord,
    SourceLocation,
    LoggerState,
} from './types.js'

export { NO_DATA, DEFAULT_LOGGER_SETTINGS } from './types.js'

// Errors
export { ConstructionError, LoggerIOError, PermissionError, WriteError } from './errors.js'

// Logger
export { SmartLogger, LOCK_FILE_NAME } from './logger.js'

// Files
export { LogFileManager } from './files.js'
export type { LogFilePolicy } from './files.js'

// Rotation
export {
    LOG_FILE_PATTERN,
    parseSize,
    logFileName,
    resolveActiveFile,
    listLogFiles,
    deleteExpired,
} from './rotation.js'

// Queues
export { SeverityQueues } from './queue.js'

// Formatting
export { buildRecord, serializeData, serializeRecords, toRow } from './formatter.js'
export type { RecordInput } from './formatter.js'

export {
    parseStack,
    captureCallSite,
    errorOrigin,
    formatLocation,
    formatTrace,
} from './callsite.js'
export type { StackFrame } from './callsite.js'
