import type { ResolvedConfig } from '../config/schema.js'
import { ShellClipboard, clipboardCommands } from '../input/clipboard.js'
import { KeyTable } from '../input/keys.js'
import type { Clipboard, InputSource, InputSynthesizer } from '../input/types.js'
import { XdotoolSynthesizer } from '../input/xdotool.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { PlaybackInterpreter } from '../player/interpreter.js'
import { RecordingStore } from '../recorder/store.js'
import { TypedEventEmitter } from './events.js'
import { type FileSystem, NodeFileSystem } from './fs.js'

export interface Container {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    fs: FileSystem
    keys: KeyTable
    store: RecordingStore
    synthesizer: InputSynthesizer
    clipboard: Clipboard
    /** Loads the native input hook on first use. */
    inputSource(): Promise<InputSource>
    createInterpreter(overrides?: { commandDelay?: number; speed?: number }): PlaybackInterpreter
    shutdown(): Promise<void>
}

export function createContainer(config: ResolvedConfig, overrides: { fs?: FileSystem } = {}): Container {
    const logger = createLogger(config)
    const eventBus = new TypedEventEmitter()
    const fs = overrides.fs ?? new NodeFileSystem()
    const keys = new KeyTable()
    const store = new RecordingStore(fs, config.recordingsDir, logger)
    const synthesizer = new XdotoolSynthesizer(logger)
    const clipboard = new ShellClipboard(clipboardCommands(process.platform))
    let source: InputSource | undefined

    const container: Container = {
        config,
        logger,
        eventBus,
        fs,
        keys,
        store,
        synthesizer,
        clipboard,

        async inputSource() {
            if (!source) {
                const { UiohookInputSource } = await import('../input/uiohook-source.js')
                source = new UiohookInputSource(logger)
            }
            return source
        },

        createInterpreter(options = {}) {
            return new PlaybackInterpreter(
                { synthesizer, clipboard, keys, logger, eventBus },
                {
                    commandDelay: options.commandDelay ?? config.commandDelay,
                    speed: options.speed ?? config.speed,
                    pasteModifier: config.pasteModifier,
                    releaseModifiersBeforeRisky: config.releaseModifiersBeforeRisky,
                    riskyCharacters: config.riskyCharacters,
                }
            )
        },

        async shutdown() {
            const errors: Error[] = []
            try {
                await source?.stop()
            } catch (e) {
                errors.push(e instanceof Error ? e : new Error(String(e)))
            }
            eventBus.removeAll()
            if (errors.length > 0) {
                logger.warn({ errors: errors.map((e) => e.message) }, 'Errors during shutdown')
            }
        },
    }

    return container
}
