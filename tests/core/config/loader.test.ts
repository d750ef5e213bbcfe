import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'

import { loadRegistryConfig, ConfigError } from '../../../src/core/config/index.js'


describe('config: loader', () => {

    let testDir: string

    beforeEach(async () => {

        testDir = join(tmpdir(), `smartlog-test-loader-${Date.now()}-${Math.random().toString(36).slice(2)}`)
        await mkdir(testDir, { recursive: true })
    })

    afterEach(async () => {

        await rm(testDir, { recursive: true, force: true })
    })

    it('should load a YAML registry config', async () => {

        const filepath = join(testDir, 'loggers.yml')

        await writeFile(filepath, [
            'default:',
            '  - ./logs',
            'audit:',
            '  - ./logs/audit',
            '  - severityThreshold: notice',
            '    maxFileSize: 10mb',
            '',
        ].join('\n'))

        const entries = await loadRegistryConfig(filepath)

        expect(entries.get('default')?.directory).toBe('./logs')
        expect(entries.get('audit')?.settings.severityThreshold).toBe(5)
        expect(entries.get('audit')?.settings.maxFileSize).toBe(10 * 1024 * 1024)
    })

    it('should load JSON', async () => {

        const filepath = join(testDir, 'loggers.json')

        await writeFile(filepath, JSON.stringify({ default: ['/tmp/logs', { maxDays: 3 }] }))

        const entries = await loadRegistryConfig(filepath)

        expect(entries.get('default')?.settings.maxDays).toBe(3)
    })

    it('should return no entries for an empty file', async () => {

        const filepath = join(testDir, 'empty.yml')

        await writeFile(filepath, '')

        expect((await loadRegistryConfig(filepath)).size).toBe(0)
    })

    it('should fail for a missing file', async () => {

        await expect(loadRegistryConfig(join(testDir, 'missing.yml')))
            .rejects.toThrow('Failed to read logger config')
    })

    it('should fail for invalid YAML', async () => {

        const filepath = join(testDir, 'broken.yml')

        await writeFile(filepath, 'default: [unclosed\n')

        await expect(loadRegistryConfig(filepath)).rejects.toThrow('Invalid YAML in logger config')
    })

    it('should fail validation with a ConfigError', async () => {

        const filepath = join(testDir, 'invalid.yml')

        await writeFile(filepath, 'default:\n  - ./logs\n  - severityThreshold: bogus\n')

        await expect(loadRegistryConfig(filepath)).rejects.toThrow(ConfigError)
    })
})
