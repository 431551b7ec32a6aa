import type { Container } from '../../core/container.js'
import { abortReason, isAbortError } from '../../core/errors.js'
import type { InputSource } from '../../input/types.js'
import { loadLocations } from '../../locations/store.js'
import { type FinishedRecording, RecordingEncoder } from '../../recorder/encoder.js'
import { createProgressReporter } from '../progress.js'
import { showOutro, showWelcome } from '../prompts.js'
import { colors } from '../ui.js'

export interface RecordOptions {
    locations?: string
}

/** Feeds input to the encoder until the stop trigger. Rejects when `signal` aborts. */
function nextRecording(source: InputSource, encoder: RecordingEncoder, signal: AbortSignal): Promise<FinishedRecording> {
    return new Promise((resolve, reject) => {
        const onAbort = () => {
            unsubscribe()
            reject(abortReason(signal))
        }
        const unsubscribe = source.subscribe((event) => {
            const result = encoder.handle(event)
            if (!result) return
            unsubscribe()
            signal.removeEventListener('abort', onAbort)
            resolve(result)
        })
        if (signal.aborted) onAbort()
        else signal.addEventListener('abort', onAbort, { once: true })
    })
}

export async function recordCommand(container: Container, options: RecordOptions, signal: AbortSignal): Promise<void> {
    const { config, logger, eventBus, fs, keys, store } = container
    const table = await loadLocations(fs, options.locations, logger)
    const encoder = new RecordingEncoder(table, {
        keys,
        logger,
        eventBus,
        threshold: config.matchThreshold,
        triggerButton: config.triggerButton,
    })

    showWelcome('mimic record')
    if (table.size > 0) console.log(colors.dim(`Loaded ${table.size} locations for matching`))
    console.log(colors.dim(`Click the ${config.triggerButton} mouse button to start and again to stop. Ctrl-C cancels.`))

    const source = await container.inputSource()
    const progress = createProgressReporter(eventBus)
    let finished: FinishedRecording
    try {
        await source.start()
        finished = await nextRecording(source, encoder, signal)
    } catch (error) {
        if (isAbortError(error) && encoder.active) showOutro(colors.warn('Recording cancelled, nothing was saved.'))
        throw error
    } finally {
        progress.dispose()
        await source.stop()
    }

    const id = await store.save(finished, table)
    if (!id) {
        showOutro(colors.warn('Nothing was recorded.'))
        return
    }
    showOutro(`${colors.success(`Saved ${id}`)} ${colors.dim(`run it with: mimic play ${id}`)}`)
}
