import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { access, mkdir, readFile, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'

import { observer } from '../../../src/core/observer.js'
import { LoggerRegistry } from '../../../src/core/registry/index.js'
import { ConfigError, parseRegistryConfig } from '../../../src/core/config/index.js'
import { ConstructionError } from '../../../src/core/logger/index.js'


async function exists(path: string): Promise<boolean> {

    return access(path).then(() => true, () => false)
}


describe('registry: logger registry', () => {

    let testDir: string

    beforeEach(async () => {

        testDir = join(tmpdir(), `smartlog-test-registry-${Date.now()}-${Math.random().toString(36).slice(2)}`)
        await mkdir(testDir, { recursive: true })
    })

    afterEach(async () => {

        observer.clear()
        await rm(testDir, { recursive: true, force: true })
    })

    it('should open every configured logger', async () => {

        const registry = await LoggerRegistry.configure({
            default: [join(testDir, 'app')],
            audit: [join(testDir, 'audit'), { severityThreshold: 'notice' }],
        })

        expect(registry.names).toEqual(['default', 'audit'])
        expect(registry.get()?.directory).toBe(join(testDir, 'app'))
        expect(registry.get('audit')?.settings.severityThreshold).toBe(5)

        await registry.closeAll()
    })

    it('should return undefined for unknown names', async () => {

        const registry = new LoggerRegistry()

        expect(registry.get()).toBeUndefined()
        expect(registry.get('missing')).toBeUndefined()
        expect(registry.has('missing')).toBe(false)
    })

    it('should accept entries parsed ahead of time', async () => {

        const entries = parseRegistryConfig({ default: [join(testDir, 'app')] })
        const registry = await LoggerRegistry.configure(entries)

        expect(registry.has('default')).toBe(true)

        await registry.closeAll()
    })

    it('should add loggers across configure calls', async () => {

        const registry = new LoggerRegistry()

        await registry.configure({ one: [join(testDir, 'one')] })
        await registry.configure({ two: [join(testDir, 'two')] })

        expect(registry.names).toEqual(['one', 'two'])

        await registry.closeAll()
    })

    it('should refuse to register a name twice', async () => {

        const registry = await LoggerRegistry.configure({ default: [join(testDir, 'app')] })

        await expect(registry.configure({ default: [join(testDir, 'other')] }))
            .rejects.toThrow("Logger 'default' is already registered")

        await registry.closeAll()
    })

    it('should register a name only once across overlapping configure calls', async () => {

        const registry = new LoggerRegistry()

        const results = await Promise.allSettled([
            registry.configure({ shared: [join(testDir, 'first')] }),
            registry.configure({ shared: [join(testDir, 'second')] }),
        ])

        expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected'])

        const rejected = results[1]

        expect(rejected?.status === 'rejected' ? rejected.reason : null).toBeInstanceOf(ConfigError)
        expect(registry.names).toEqual(['shared'])
        expect(registry.get('shared')?.directory).toBe(join(testDir, 'first'))

        await registry.closeAll()
    })

    it('should free reserved names when configure fails', async () => {

        await writeFile(join(testDir, 'blocker'), '')

        const registry = new LoggerRegistry()

        await expect(registry.configure({ retry: [join(testDir, 'blocker', 'logs')] }))
            .rejects.toThrow(ConstructionError)

        await registry.configure({ retry: [join(testDir, 'retry')] })

        expect(registry.names).toEqual(['retry'])

        await registry.closeAll()
    })

    it('should reject invalid configuration', async () => {

        await expect(LoggerRegistry.configure({ default: ['/logs', { severityThreshold: 'bogus' }] }))
            .rejects.toThrow(ConfigError)
    })

    it('should register nothing when any logger fails to open', async () => {

        await writeFile(join(testDir, 'blocker'), '')

        const registry = new LoggerRegistry()

        await expect(registry.configure({
            good: [join(testDir, 'good')],
            bad: [join(testDir, 'blocker', 'logs')],
        })).rejects.toThrow(ConstructionError)

        expect(registry.names).toEqual([])
    })

    it('should flush every logger', async () => {

        const registry = await LoggerRegistry.configure({
            one: [join(testDir, 'one')],
            two: [join(testDir, 'two')],
        })

        registry.get('one')?.error('from one')
        registry.get('two')?.error('from two')

        await registry.flushAll()

        const one = registry.get('one')?.filepath ?? ''
        const two = registry.get('two')?.filepath ?? ''

        expect(await readFile(one, 'utf-8')).toContain(',ERROR,from one,')
        expect(await readFile(two, 'utf-8')).toContain(',ERROR,from two,')

        await registry.closeAll()
    })

    it('should close and forget every logger', async () => {

        const registry = await LoggerRegistry.configure({ default: [join(testDir, 'app')] })
        const logger = registry.get()

        await registry.closeAll()

        expect(logger?.state).toBe('closed')
        expect(registry.names).toEqual([])
    })

    it('should skip the disk for loggers configured off', async () => {

        const registry = await LoggerRegistry.configure({
            quiet: [join(testDir, 'quiet'), { severityThreshold: 'off' }],
        })

        expect(registry.get('quiet')?.isEnabled).toBe(false)
        expect(await exists(join(testDir, 'quiet'))).toBe(false)

        await registry.closeAll()
    })
})
