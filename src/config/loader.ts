import path from 'node:path'
import type { FileSystem } from '../core/fs.js'
import { CONFIG_DIR, DEFAULT_CONFIG, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Partial<Config>
    projectDir?: string
}

async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    try {
        if (await fs.exists(filePath)) {
            const raw = await fs.readJSON<unknown>(filePath)
            return ConfigSchema.parse(raw)
        }
    } catch {
        // Invalid config file, skip
    }
    return {}
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        Object.assign(merged, Object.fromEntries(Object.entries(cfg).filter(([, value]) => value !== undefined)))
    }
    return merged
}

function readEnvConfig(): Config {
    const parsed = ConfigSchema.safeParse({
        logLevel: process.env.MIMIC_LOG_LEVEL,
        recordingsDir: process.env.MIMIC_RECORDINGS_DIR,
        commandDelay: process.env.MIMIC_COMMAND_DELAY ? Number(process.env.MIMIC_COMMAND_DELAY) : undefined,
    })
    return parsed.success ? parsed.data : {}
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd() } = options

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE))

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, readEnvConfig(), cliFlags)

    return {
        ...DEFAULT_CONFIG,
        ...merged,
        recordingsDir: path.resolve(projectDir, merged.recordingsDir ?? DEFAULT_CONFIG.recordingsDir),
        riskyCharacters: merged.riskyCharacters ?? [...DEFAULT_CONFIG.riskyCharacters],
        projectDir,
        configDir: CONFIG_DIR,
    }
}
