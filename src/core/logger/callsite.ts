/**
 * Call Sites
 *
 * Turns V8 stack traces into source locations. Used for two things:
 * locating the origin of a logged Error, and (when enabled) finding
 * the first caller outside this module for plain-text messages.
 */
import { dirname } from 'node:path'
import { fileURLToPath } from 'node:url'

import type { SourceLocation } from './types.js'


/**
 * One parsed stack frame.
 */
export interface StackFrame {
    file: string;
    line: number;
    column: number;
    function: string | null;
}

// "    at fn (/path/file.ts:12:5)" or "    at /path/file.ts:12:5"
const FRAME_PATTERN = /^\s*at (?:(.+?) \()?(.+?):(\d+):(\d+)\)?$/

const MODULE_DIR = dirname(fileURLToPath(import.meta.url))


/**
 * Parse a V8 stack string into frames.
 *
 * The message line and frames without a position (native code,
 * `<anonymous>`) are skipped.
 *
 * @example
 * ```typescript
 * parseStack('Error: boom\n    at run (/app/main.ts:4:11)')
 * // [{ file: '/app/main.ts', line: 4, column: 11, function: 'run' }]
 * ```
 */
export function parseStack(stack: string | undefined): StackFrame[] {

    if (!stack) {

        return []
    }

    const frames: StackFrame[] = []

    for (const raw of stack.split('\n')) {

        const match = FRAME_PATTERN.exec(raw)

        if (!match || !match[2] || !match[3] || !match[4]) {

            continue
        }

        frames.push({
            file: normalizeFile(match[2]),
            line: Number(match[3]),
            column: Number(match[4]),
            function: match[1] ?? null,
        })
    }

    return frames
}


/**
 * Location of the first frame outside the logger module.
 *
 * Returns null when nothing outside the module is on the stack.
 */
export function captureCallSite(): SourceLocation | null {

    const frame = parseStack(new Error().stack).find(
        (f) => !f.file.startsWith(MODULE_DIR),
    )

    if (!frame) {

        return null
    }

    return toLocation(frame)
}


/**
 * Location an Error was raised at (its top frame).
 */
export function errorOrigin(error: Error): SourceLocation | null {

    const frame = parseStack(error.stack)[0]

    return frame ? toLocation(frame) : null
}


/**
 * Render the location column: `file(line)`, plus `: fn` when known.
 *
 * @example
 * ```typescript
 * formatLocation({ file: 'app.ts', line: 12 })                   // 'app.ts(12)'
 * formatLocation({ file: 'app.ts', line: 12, function: 'main' }) // 'app.ts(12): main'
 * formatLocation(null)                                           // '()'
 * ```
 */
export function formatLocation(location: SourceLocation | null): string {

    const file = location?.file ?? ''
    const line = location?.line ?? ''
    const base = `${file}(${line})`

    return location?.function ? `${base}: ${location.function}` : base
}


/**
 * Synthesize a numbered trace from an Error's stack.
 *
 * One line per frame, always closed by a `{main}` entry.
 *
 * @example
 * ```typescript
 * formatTrace(err)
 * // '#0 /app/db.ts(10): connect\n#1 /app/main.ts(4): run\n#2 {main}'
 * ```
 */
export function formatTrace(error: Error): string {

    const frames = parseStack(error.stack)
    const lines = frames.map((f, i) => `#${i} ${f.file}(${f.line}): ${f.function ?? '{closure}'}`)

    lines.push(`#${frames.length} {main}`)

    return lines.join('\n')
}


function toLocation(frame: StackFrame): SourceLocation {

    const location: SourceLocation = { file: frame.file, line: frame.line }

    if (frame.function) {

        location.function = frame.function
    }

    return location
}


function normalizeFile(file: string): string {

    return file.startsWith('file://') ? fileURLToPath(file) : file
}
