/**
 * Logger Types
 *
 * Type definitions for the smartlog logger. A logger buffers records
 * per severity in memory and flushes them as CSV rows into a rotating
 * log file when asked to, or when it is closed.
 */
import type { SeverityInput } from '../severity/index.js'


/**
 * Marker for "no data supplied".
 *
 * `null`, `undefined` and `''` are all valid payloads that get
 * serialized; only this symbol leaves the data column empty.
 */
export const NO_DATA: unique symbol = Symbol('smartlog.noData')

export type NoData = typeof NO_DATA

/**
 * Per-logger settings after normalization.
 */
export interface LoggerSettings {
    /** Records at or above this severity (rank at or below) are logged. OFF disables the logger. */
    severityThreshold: number;

    /** Any record at or above this severity escalates the flush window to everything. */
    smartSeverityThreshold: number;

    /** The active file rotates once it grows beyond this many bytes */
    maxFileSize: number;

    /** Log files dated more than this many days ago are deleted */
    maxDays: number;

    /** dayjs format string for the timestamp column */
    dateFormat: string;

    /** Mode for created directories, lock file and log files */
    defaultPermission: number;
}

/**
 * Settings as callers write them.
 *
 * Severities may be names (prefixes work), ordinals or `'off'`;
 * sizes may be byte counts or strings like `'10mb'`.
 */
export interface LoggerSettingsInput {
    severityThreshold?: SeverityInput;
    smartSeverityThreshold?: SeverityInput;
    maxFileSize?: number | string;
    maxDays?: number;
    dateFormat?: string;
    defaultPermission?: number;
}

/**
 * Default logger settings.
 */
export const DEFAULT_LOGGER_SETTINGS: LoggerSettings = {
    severityThreshold: 6,
    smartSeverityThreshold: 5,
    maxFileSize: 100_000_000,
    maxDays: 7,
    dateFormat: 'YYYY-MM-DD HH:mm:ss.SSS',
    defaultPermission: 0o777,
};

/**
 * Runtime options that aren't part of the persisted configuration.
 */
export interface LoggerOptions {
    /**
     * Resolve the location from the caller's stack frame when no
     * file/line override is given.
     * @default true
     */
    captureCallSite?: boolean;

    /** Poll interval while waiting for the directory lock (ms) */
    lockRetryMs?: number;

    /** Give up waiting for the directory lock after this long (ms). Waits forever when unset. */
    lockTimeoutMs?: number;
}

/**
 * Per-call overrides for a log record.
 *
 * `file`/`line` are ignored when the message is an Error, which
 * carries its own origin. A `data` key (even one set to undefined)
 * replaces the positional data argument.
 */
export interface LogOverrides {
    file?: string;
    line?: number;
    function?: string;
    data?: unknown;
}

/**
 * What a caller may log: text, or a raised error.
 */
export type LogMessage = string | Error

/**
 * A single buffered record.
 *
 * Sequence numbers increase strictly within one logger and restore
 * chronological order across severity queues at flush time.
 */
export interface LogRecord {
    readonly sequence: number;
    readonly timestamp: string;
    readonly severity: number;
    readonly label: string;
    readonly message: string;
    readonly location: string;
    readonly trace: string | null;
    readonly data: string | null;
}

/**
 * A resolved source location.
 */
export interface SourceLocation {
    file: string;
    line: number | null;
    function?: string;
}

/**
 * Logger state for lifecycle management.
 */
export type LoggerState = 'active' | 'closing' | 'closed';
