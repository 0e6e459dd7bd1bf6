import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import pino from 'pino'
import { GLOBAL_CONFIG_FILE } from '../../../src/config/defaults.js'
import { loadConfig } from '../../../src/config/loader.js'
import { MockFileSystem } from '../../../src/core/fs.js'

describe('loadConfig', () => {
    const originalEnv = process.env

    beforeEach(() => {
        process.env = { ...originalEnv }
        delete process.env.SPAN_LAYOUT_LOG_LEVEL
        delete process.env.SPAN_LAYOUT_CULTURE
    })

    afterEach(() => {
        process.env = originalEnv
    })

    it('returns defaults when no config files exist', async () => {
        const config = await loadConfig({ fs: new MockFileSystem(), projectDir: '/project' })
        expect(config.logLevel).toBe('info')
        expect(config.culture).toBe('invariant')
        expect(config.fields).toEqual({
            traceId: { property: 'TraceId' },
            spanId: { property: 'SpanId' },
        })
        expect(config.projectDir).toBe('/project')
    })

    it('loads the project config file and resolves property names', async () => {
        const fs = new MockFileSystem()
        fs.setFile(
            '/project/span-layout.config.json',
            JSON.stringify({ fields: { flags: { property: 'traceflags', format: 'd' } } })
        )
        const config = await loadConfig({ fs, projectDir: '/project' })
        expect(config.fields).toEqual({ flags: { property: 'ActivityTraceFlags', format: 'd' } })
    })

    it('merges project fields over global fields by name', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL_CONFIG_FILE, JSON.stringify({ culture: 'de-DE', fields: { a: { property: 'Id' }, b: { property: 'Tags' } } }))
        fs.setFile('/project/span-layout.config.json', JSON.stringify({ fields: { b: { property: 'Baggage' } } }))
        const config = await loadConfig({ fs, projectDir: '/project' })
        expect(config.culture).toBe('de-DE')
        expect(config.fields).toEqual({ a: { property: 'Id' }, b: { property: 'Baggage' } })
    })

    it('reads an explicit config file instead of the project file', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/project/span-layout.config.json', JSON.stringify({ logLevel: 'error' }))
        fs.setFile('/etc/layout.json', JSON.stringify({ logLevel: 'trace' }))
        const config = await loadConfig({ fs, projectDir: '/project', configFile: '/etc/layout.json' })
        expect(config.logLevel).toBe('trace')
    })

    it('env vars override config files and CLI flags override env vars', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/project/span-layout.config.json', JSON.stringify({ logLevel: 'error', culture: 'fr-FR' }))
        process.env.SPAN_LAYOUT_LOG_LEVEL = 'warn'
        process.env.SPAN_LAYOUT_CULTURE = 'en-GB'

        const fromEnv = await loadConfig({ fs, projectDir: '/project' })
        expect(fromEnv.logLevel).toBe('warn')
        expect(fromEnv.culture).toBe('en-GB')

        const fromFlags = await loadConfig({ fs, projectDir: '/project', cliFlags: { logLevel: 'debug' } })
        expect(fromFlags.logLevel).toBe('debug')
    })

    it('ignores an invalid log level in the environment', async () => {
        process.env.SPAN_LAYOUT_LOG_LEVEL = 'loud'
        const config = await loadConfig({ fs: new MockFileSystem(), projectDir: '/project' })
        expect(config.logLevel).toBe('info')
    })

    it('skips an invalid file and warns', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/project/span-layout.config.json', JSON.stringify({ fields: { x: { property: 'Nope' } } }))
        const lines: string[] = []
        const logger = pino({ level: 'warn' }, { write: (line: string) => lines.push(line) })

        const config = await loadConfig({ fs, projectDir: '/project', logger })

        expect(config.fields).toEqual({
            traceId: { property: 'TraceId' },
            spanId: { property: 'SpanId' },
        })
        expect(lines).toHaveLength(1)
        const entry: unknown = JSON.parse(lines[0] ?? '{}')
        expect(entry).toMatchObject({ msg: 'config:invalid', file: '/project/span-layout.config.json' })
    })
})
