import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, readFile, rm, writeFile, access } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'

import { observer } from '../../../src/core/observer.js'
import { InterProcessMutex, LockError, GUARD_SUFFIX, OWNER_SUFFIX } from '../../../src/core/lock/index.js'

// Far above any real pid_max, so kill(pid, 0) reports ESRCH
const DEAD_PID = 2_147_483_000


async function exists(path: string): Promise<boolean> {

    return access(path).then(() => true, () => false)
}


describe('lock: mutex', () => {

    let testDir: string
    let lockfile: string

    beforeEach(async () => {

        testDir = join(tmpdir(), `smartlog-test-mutex-${Date.now()}-${Math.random().toString(36).slice(2)}`)
        lockfile = join(testDir, '.lockfile')
        await mkdir(testDir, { recursive: true })
    })

    afterEach(async () => {

        observer.clear()
        await rm(testDir, { recursive: true, force: true })
    })

    describe('acquire / release', () => {

        it('should write the status marker', async () => {

            const mutex = new InterProcessMutex(lockfile)

            await mutex.acquire()
            expect(await readFile(lockfile, 'utf-8')).toBe('Locked\n')
            expect(mutex.isHeld).toBe(true)

            await mutex.release()
            expect(await readFile(lockfile, 'utf-8')).toBe('Unlocked\n')
            expect(mutex.isHeld).toBe(false)
        })

        it('should record the holder pid in the token file', async () => {

            const mutex = new InterProcessMutex(lockfile)

            await mutex.acquire()
            expect(await readFile(`${lockfile}${OWNER_SUFFIX}`, 'utf-8')).toBe(String(process.pid))

            await mutex.release()
            expect(await exists(`${lockfile}${OWNER_SUFFIX}`)).toBe(false)
        })

        it('should emit lock:acquired and lock:released', async () => {

            const events: string[] = []
            observer.on('lock:acquired', () => events.push('acquired'))
            observer.on('lock:released', () => events.push('released'))

            const mutex = new InterProcessMutex(lockfile)

            await mutex.acquire()
            await mutex.release()

            expect(events).toEqual(['acquired', 'released'])
        })

        it('should throw when acquired twice by the same mutex', async () => {

            const mutex = new InterProcessMutex(lockfile)

            await mutex.acquire()

            await expect(mutex.acquire()).rejects.toThrow(LockError)

            await mutex.release()
        })

        it('should warn instead of throwing when released without holding', async () => {

            const warnings: string[] = []
            observer.on('lock:warning', ({ message }) => warnings.push(message))

            const mutex = new InterProcessMutex(lockfile)

            await expect(mutex.release()).resolves.toBeUndefined()
            expect(warnings).toEqual(['release called without holding the lock'])
        })

        it('should fail when the lock directory does not exist', async () => {

            const mutex = new InterProcessMutex(join(testDir, 'missing', '.lockfile'))

            await expect(mutex.acquire()).rejects.toThrow(LockError)
            expect(mutex.isHeld).toBe(false)
        })
    })

    describe('exclusion', () => {

        it('should make a second holder wait for the first', async () => {

            const first = new InterProcessMutex(lockfile, { retryInterval: 5 })
            const second = new InterProcessMutex(lockfile, { retryInterval: 5 })
            const order: string[] = []

            await first.acquire()

            const waiting = second.acquire().then(() => order.push('second acquired'))

            await new Promise((resolve) => setTimeout(resolve, 30))
            order.push('first releasing')
            await first.release()

            await waiting
            await second.release()

            expect(order).toEqual(['first releasing', 'second acquired'])
        })

        it('should never run two critical sections at once', async () => {

            let active = 0
            let maxActive = 0

            const section = async () => {

                active++
                maxActive = Math.max(maxActive, active)
                await new Promise((resolve) => setTimeout(resolve, 5))
                active--
            }

            const mutexes = Array.from({ length: 4 }, () => new InterProcessMutex(lockfile, { retryInterval: 2 }))

            await Promise.all(mutexes.map((m) => m.withLock(section)))

            expect(maxActive).toBe(1)
        })

        it('should time out when waitTimeout elapses', async () => {

            const holder = new InterProcessMutex(lockfile)
            const waiter = new InterProcessMutex(lockfile, { retryInterval: 5, waitTimeout: 30 })

            await holder.acquire()

            await expect(waiter.acquire()).rejects.toThrow('timed out after 30ms')

            await holder.release()
        })
    })

    describe('stale tokens', () => {

        it('should take over a token left by a dead process', async () => {

            const stale: number[] = []
            observer.on('lock:stale', ({ pid }) => stale.push(pid))

            await writeFile(`${lockfile}${OWNER_SUFFIX}`, String(DEAD_PID))

            const mutex = new InterProcessMutex(lockfile, { waitTimeout: 500 })

            await mutex.acquire()

            expect(stale).toEqual([DEAD_PID])
            expect(await readFile(`${lockfile}${OWNER_SUFFIX}`, 'utf-8')).toBe(String(process.pid))

            await mutex.release()
        })

        it('should let only one of several waiters take over a dead token', async () => {

            const stale: number[] = []
            observer.on('lock:stale', ({ pid }) => stale.push(pid))

            await writeFile(`${lockfile}${OWNER_SUFFIX}`, String(DEAD_PID))

            let active = 0
            let maxActive = 0

            const section = async () => {

                active++
                maxActive = Math.max(maxActive, active)
                await new Promise((resolve) => setTimeout(resolve, 5))
                active--
            }

            const mutexes = Array.from({ length: 6 }, () => new InterProcessMutex(lockfile, { retryInterval: 1 }))

            await Promise.all(mutexes.map((m) => m.withLock(section)))

            expect(maxActive).toBe(1)
            expect(stale).toEqual([DEAD_PID])
            expect(await exists(`${lockfile}${OWNER_SUFFIX}`)).toBe(false)
            expect(await exists(`${lockfile}${OWNER_SUFFIX}${GUARD_SUFFIX}`)).toBe(false)
        })

        it('should leave the token alone while another waiter holds the guard', async () => {

            await writeFile(`${lockfile}${OWNER_SUFFIX}`, String(DEAD_PID))
            await writeFile(`${lockfile}${OWNER_SUFFIX}${GUARD_SUFFIX}`, String(process.pid))

            const mutex = new InterProcessMutex(lockfile, { retryInterval: 5, waitTimeout: 30 })

            await expect(mutex.acquire()).rejects.toThrow('timed out after 30ms')
            expect(await readFile(`${lockfile}${OWNER_SUFFIX}`, 'utf-8')).toBe(String(DEAD_PID))
        })

        it('should not take over a token held by a live process', async () => {

            await writeFile(`${lockfile}${OWNER_SUFFIX}`, String(process.pid))

            const mutex = new InterProcessMutex(lockfile, { retryInterval: 5, waitTimeout: 30 })

            await expect(mutex.acquire()).rejects.toThrow(LockError)
        })
    })

    describe('withLock', () => {

        it('should return the operation result and release', async () => {

            const mutex = new InterProcessMutex(lockfile)

            const result = await mutex.withLock(async () => 42)

            expect(result).toBe(42)
            expect(mutex.isHeld).toBe(false)
            expect(await readFile(lockfile, 'utf-8')).toBe('Unlocked\n')
        })

        it('should release and rethrow when the operation fails', async () => {

            const mutex = new InterProcessMutex(lockfile)

            await expect(mutex.withLock(async () => {

                throw new Error('operation failed')
            })).rejects.toThrow('operation failed')

            expect(mutex.isHeld).toBe(false)
            expect(await exists(`${lockfile}${OWNER_SUFFIX}`)).toBe(false)
        })
    })
})
