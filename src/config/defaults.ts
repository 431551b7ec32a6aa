import type { ResolvedConfig } from './schema.js'

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'projectDir' | 'configDir'> = {
    logLevel: 'warn',
    recordingsDir: 'recordings',
    matchThreshold: 20,
    commandDelay: 0.1,
    speed: 1,
    countdown: 3,
    startKey: 'f1',
    triggerButton: 'middle',
    pasteModifier: process.platform === 'darwin' ? 'cmd' : 'ctrl',
    releaseModifiersBeforeRisky: true,
    // letters that open system UI when typed while the globe/fn key is stuck down
    riskyCharacters: ['a', 'c', 'e', 'f', 'n', 'q'],
}

export const CONFIG_DIR = `${process.env.HOME ?? '~'}/.config/mimic`
export const GLOBAL_CONFIG_FILE = `${CONFIG_DIR}/config.json`
export const LOCAL_CONFIG_DIR = '.mimic'
export const LOCAL_CONFIG_FILE = `${LOCAL_CONFIG_DIR}/config.json`

export const SCRIPT_FILE = 'script.txt'
export const LOCATIONS_FILE = 'locations.json'
export const INFO_FILE = 'info.json'
