import path from 'node:path'
import { describe, it, expect } from 'vitest'
import { MockFileSystem } from '../../../src/core/fs.js'
import { loadConfig } from '../../../src/config/loader.js'
import { GLOBAL_CONFIG_FILE } from '../../../src/config/defaults.js'

const PROJECT = '/work/project'

describe('loadConfig', () => {
    it('returns defaults when no config files exist', async () => {
        const config = await loadConfig({ fs: new MockFileSystem(), projectDir: PROJECT })
        expect(config.logLevel).toBe('warn')
        expect(config.matchThreshold).toBe(20)
        expect(config.commandDelay).toBe(0.1)
        expect(config.speed).toBe(1)
        expect(config.countdown).toBe(3)
        expect(config.startKey).toBe('f1')
        expect(config.triggerButton).toBe('middle')
        expect(config.releaseModifiersBeforeRisky).toBe(true)
        expect(config.riskyCharacters).toEqual(['a', 'c', 'e', 'f', 'n', 'q'])
        expect(config.recordingsDir).toBe(path.resolve(PROJECT, 'recordings'))
    })

    it('loads the global config file', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL_CONFIG_FILE, JSON.stringify({ countdown: 5 }))
        const config = await loadConfig({ fs, projectDir: PROJECT })
        expect(config.countdown).toBe(5)
    })

    it('local config overrides global config', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL_CONFIG_FILE, JSON.stringify({ speed: 2, countdown: 5 }))
        fs.setFile(path.join(PROJECT, '.mimic/config.json'), JSON.stringify({ speed: 4 }))
        const config = await loadConfig({ fs, projectDir: PROJECT })
        expect(config.speed).toBe(4)
        expect(config.countdown).toBe(5)
    })

    it('skips invalid config files', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL_CONFIG_FILE, JSON.stringify({ speed: -1 }))
        fs.setFile(path.join(PROJECT, '.mimic/config.json'), '{ not json')
        const config = await loadConfig({ fs, projectDir: PROJECT })
        expect(config.speed).toBe(1)
    })

    it('env vars override config files', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL_CONFIG_FILE, JSON.stringify({ commandDelay: 0.5 }))
        process.env.MIMIC_COMMAND_DELAY = '0.25'
        process.env.MIMIC_RECORDINGS_DIR = 'macros'
        const config = await loadConfig({ fs, projectDir: PROJECT })
        expect(config.commandDelay).toBe(0.25)
        expect(config.recordingsDir).toBe(path.resolve(PROJECT, 'macros'))
    })

    it('CLI flags override env vars', async () => {
        process.env.MIMIC_LOG_LEVEL = 'info'
        const config = await loadConfig({
            fs: new MockFileSystem(),
            projectDir: PROJECT,
            cliFlags: { logLevel: 'debug' },
        })
        expect(config.logLevel).toBe('debug')
    })

    it('ignores invalid env values', async () => {
        process.env.MIMIC_COMMAND_DELAY = 'soon'
        const config = await loadConfig({ fs: new MockFileSystem(), projectDir: PROJECT })
        expect(config.commandDelay).toBe(0.1)
    })
})
