/**
 * Central event system for smartlog.
 *
 * The library never writes its own diagnostics into the log files it
 * manages. Instead, every module reports lifecycle and failure details
 * here, and the host application decides what to do with them.
 *
 * @example
 * ```typescript
 * // Subscribe to a single event
 * const cleanup = observer.on('logger:rotated', ({ from, to }) => {
 *     console.log(`Rotated ${from} -> ${to}`)
 * })
 *
 * // Pattern matching for a whole namespace
 * observer.on(/^lock:/, ({ event, data }) => audit(event, data))
 *
 * cleanup()
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'


/**
 * All events emitted by smartlog modules.
 *
 * Events are namespaced by module:
 * - `logger:*` - Logger open, rotation, retention, flush, close
 * - `lock:*` - Inter-process mutex acquisition/release
 * - `bridge:*` - Process notification capture
 * - `error` - Catch-all errors that are reported instead of thrown
 */
export interface SmartlogEvents {

    // Logger
    'logger:opened': { directory: string; filepath: string }
    'logger:rotated': { directory: string; from: string; to: string }
    'logger:expired': { filepath: string }
    'logger:flushed': { filepath: string; count: number; verbose: boolean }
    'logger:closed': { directory: string; filepath: string | null }

    // Lock
    'lock:acquired': { lockfile: string; waitedMs: number }
    'lock:released': { lockfile: string }
    'lock:stale': { lockfile: string; pid: number }
    'lock:warning': { lockfile: string; message: string }

    // Error bridge
    'bridge:installed': { logger: string; capture: string[] }
    'bridge:captured': { logger: string; kind: string; severity: string }

    // Errors
    'error': { source: string; error: Error; context?: Record<string, unknown> }
}

export type SmartlogEventNames = Events<SmartlogEvents>;
export type SmartlogEventCallback<E extends SmartlogEventNames> = ObserverEngine.EventCallback<SmartlogEvents[E]>

/**
 * Global observer instance for smartlog.
 *
 * Enable debug mode with `SMARTLOG_DEBUG=1` to see all events as they occur.
 */
export const observer = new ObserverEngine<SmartlogEvents>({
    name: 'smartlog',
    spy: process.env['SMARTLOG_DEBUG']
        ? (action) => console.error(`[smartlog:${action.fn}] ${String(action.event)}`)
        : undefined
});

export type { ObserverEngine }
