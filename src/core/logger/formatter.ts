/**
 * Log Formatter
 *
 * Builds LogRecord objects and serializes them as CSV rows. Columns are
 * fixed: timestamp, severity label, message, location, trace, data.
 */
import dayjs from 'dayjs'
import { stringify } from 'csv-stringify/sync'
import { attemptSync } from '@logosdx/utils'

import { severityLabel } from '../severity/index.js'
import { captureCallSite, errorOrigin, formatLocation, formatTrace } from './callsite.js'
import type { LogMessage, LogOverrides, LogRecord, SourceLocation } from './types.js'
import { NO_DATA } from './types.js'


/**
 * Inputs needed to build one record.
 */
export interface RecordInput {
    sequence: number;
    severity: number;
    message: LogMessage;
    data: unknown;
    overrides: LogOverrides;
    dateFormat: string;
    captureCallSite: boolean;
}


/**
 * Serialize a data payload for the data column.
 *
 * `NO_DATA` yields null (empty column). Everything else, including
 * null and undefined, is rendered so it shows up in the log.
 *
 * @example
 * ```typescript
 * serializeData(NO_DATA)        // null
 * serializeData(null)           // 'null'
 * serializeData({ id: 7 })      // '{"id":7}'
 * serializeData(undefined)      // 'undefined'
 * ```
 */
export function serializeData(data: unknown): string | null {

    if (data === NO_DATA) {

        return null
    }

    const [json, err] = attemptSync(() => JSON.stringify(data))

    // Circular structures, BigInt, functions and undefined have no JSON form
    if (err || json === undefined) {

        return String(data)
    }

    return json
}


/**
 * Build an immutable record from a log call.
 *
 * For an Error message the text becomes `Class: message`, the location
 * comes from the error's own stack and a trace is attached; file/line
 * overrides only apply to plain-text messages.
 */
export function buildRecord(input: RecordInput): LogRecord {

    const { overrides } = input
    const data = 'data' in overrides ? overrides.data : input.data

    let message: string
    let location: SourceLocation | null
    let trace: string | null = null

    if (input.message instanceof Error) {

        message = `${errorName(input.message)}: ${input.message.message}`
        location = errorOrigin(input.message)
        trace = formatTrace(input.message)
    }
    else {

        message = input.message
        location = resolveLocation(overrides, input.captureCallSite)
    }

    return Object.freeze({
        sequence: input.sequence,
        timestamp: dayjs().format(input.dateFormat),
        severity: input.severity,
        label: severityLabel(input.severity).toUpperCase(),
        message,
        location: formatLocation(location),
        trace,
        data: serializeData(data),
    })
}


/**
 * Convert a record to its CSV column values.
 */
export function toRow(record: LogRecord): Array<string | null> {

    return [
        record.timestamp,
        record.label,
        record.message,
        record.location,
        record.trace,
        record.data,
    ]
}


/**
 * Serialize records as CSV, one row per record.
 *
 * Null columns are written empty; fields containing the delimiter,
 * quotes or line breaks are quoted.
 *
 * @example
 * ```typescript
 * serializeRecords([record])
 * // '2024-01-15 10:30:00.000,ERROR,Disk full,app.ts(12),,\n'
 * ```
 */
export function serializeRecords(records: readonly LogRecord[]): string {

    if (records.length === 0) {

        return ''
    }

    return stringify(records.map(toRow), { record_delimiter: 'unix' })
}


// Subclasses that don't set `name` still report their class
function errorName(error: Error): string {

    return error.name === 'Error' ? error.constructor.name : error.name
}


function resolveLocation(overrides: LogOverrides, capture: boolean): SourceLocation {

    if (overrides.file !== undefined) {

        const location: SourceLocation = {
            file: overrides.file,
            line: overrides.line ?? null,
        }

        if (overrides.function !== undefined) {

            location.function = overrides.function
        }

        return location
    }

    const location: SourceLocation = (capture ? captureCallSite() : null) ?? {
        file: '',
        line: overrides.line ?? null,
    }

    if (overrides.function !== undefined) {

        location.function = overrides.function
    }

    return location
}
