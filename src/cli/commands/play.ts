import * as clack from '@clack/prompts'
import type { Container } from '../../core/container.js'
import { FatalError } from '../../core/errors.js'
import { countdown, waitForStartKey } from '../../player/start.js'
import type { LoadedRecording } from '../../recorder/store.js'
import { countActions } from '../../script/commands.js'
import { createProgressReporter } from '../progress.js'
import { selectRecording, showOutro, showWelcome } from '../prompts.js'
import { colors, formatDiagnostic, formatError } from '../ui.js'

export interface PlayOptions {
    locations?: string
    delay?: number
    speed?: number
    countdown?: boolean
}

async function printAvailable(container: Container): Promise<void> {
    const recordings = await container.store.list()
    if (recordings.length === 0) {
        console.log(colors.dim('No recordings yet. Create one with: mimic record'))
        return
    }
    console.log(colors.dim('Available recordings:'))
    for (const recording of recordings) {
        console.log(`  ${recording.id} ${colors.dim(recording.info?.description ?? '')}`)
    }
}

/** Loads a recording, printing the available ones when it does not exist. */
export async function loadOrExplain(container: Container, idOrFile: string | undefined): Promise<LoadedRecording | undefined> {
    let target = idOrFile
    if (!target) {
        const recordings = await container.store.list()
        if (recordings.length === 0) {
            console.log(formatError('No recordings found.', 'Create one with: mimic record'))
            process.exitCode = 1
            return undefined
        }
        target = (await selectRecording(recordings)) ?? undefined
        if (!target) return undefined
    }

    try {
        return await container.store.load(target)
    } catch (error) {
        if (!(error instanceof FatalError)) throw error
        console.error(formatError(error.message))
        await printAvailable(container)
        process.exitCode = 1
        return undefined
    }
}

export async function playCommand(
    container: Container,
    idOrFile: string | undefined,
    options: PlayOptions,
    signal: AbortSignal
): Promise<void> {
    const { config, keys, store, eventBus } = container
    const recording = await loadOrExplain(container, idOrFile)
    if (!recording) return

    for (const diagnostic of recording.diagnostics) console.log(formatDiagnostic(diagnostic))
    const table = await store.loadTable(recording.paths, options.locations)

    showWelcome(`mimic play ${recording.id ?? recording.paths.script}`)
    console.log(colors.dim(`${countActions(recording.commands)} commands, ${table.size} locations`))

    if (options.countdown) {
        const spinner = clack.spinner()
        spinner.start('Starting')
        try {
            await countdown(config.countdown, (remaining) => spinner.message(`Starting in ${remaining}...`), signal)
        } finally {
            spinner.stop('Go')
        }
    } else {
        const source = await container.inputSource()
        console.log(colors.dim(`Focus the target window and press ${config.startKey} to start. Ctrl-C cancels.`))
        await source.start()
        try {
            await waitForStartKey(source, keys, config.startKey, signal)
        } finally {
            await source.stop()
        }
    }

    const progress = createProgressReporter(eventBus)
    try {
        const interpreter = container.createInterpreter({ commandDelay: options.delay, speed: options.speed })
        const summary = await interpreter.run(recording.commands, table, signal)
        showOutro(summary.aborted ? colors.warn('Stopped.') : colors.success('Done.'))
    } finally {
        progress.dispose()
    }
}
