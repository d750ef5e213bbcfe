/**
 * Severity Queues
 *
 * In-memory buffer holding one FIFO queue per severity rank. Every
 * severity is buffered, even those normally filtered out, so that an
 * escalating event can still emit the debug breadcrumbs leading up to
 * it. Draining merges the chosen queues back into enqueue order.
 *
 * @example
 * ```typescript
 * const queues = new SeverityQueues()
 *
 * queues.push(debugRecord)   // sequence 0, rank 7
 * queues.push(errorRecord)   // sequence 1, rank 3
 *
 * queues.drain(6)  // [errorRecord] (debug discarded)
 * queues.size      // 0
 * ```
 */
import { SEVERITY_COUNT } from '../severity/index.js'
import type { LogRecord } from './types.js'


export class SeverityQueues {

    #queues: LogRecord[][] = SeverityQueues.#build()


    /**
     * Number of buffered records across all ranks.
     */
    get size(): number {

        return this.#queues.reduce((total, queue) => total + queue.length, 0)
    }


    /**
     * Number of buffered records at one rank.
     */
    sizeOf(rank: number): number {

        return this.#queues[rank]?.length ?? 0
    }


    /**
     * Buffer a record on the queue for its severity.
     */
    push(record: LogRecord): void {

        const queue = this.#queues[record.severity]

        if (!queue) {

            throw new RangeError(`No queue for severity ${record.severity}`)
        }

        queue.push(record)
    }


    /**
     * Take records up to a rank and empty every queue.
     *
     * Records at ranks numerically above `maxRank` are discarded, not
     * kept for a later drain. The result is ordered by sequence number.
     *
     * @param maxRank - Least severe rank to keep (7 keeps everything)
     */
    drain(maxRank: number): LogRecord[] {

        const selected = this.#queues.slice(0, Math.max(0, maxRank + 1)).flat()

        this.#queues = SeverityQueues.#build()

        return selected.sort((a, b) => a.sequence - b.sequence)
    }


    static #build(): LogRecord[][] {

        return Array.from({ length: SEVERITY_COUNT }, () => [])
    }
}
