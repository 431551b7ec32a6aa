import type { Container } from '../../core/container.js'
import { RecoverableError, isAbortError } from '../../core/errors.js'
import { loadLocations } from '../../locations/store.js'
import { parseLine } from '../../script/parser.js'
import { askCommandLine, showOutro, showWelcome } from '../prompts.js'
import { colors } from '../ui.js'

const QUIT_WORDS = new Set(['quit', 'exit', 'q'])

export interface ShellOptions {
    locations?: string
}

/** Reads one script line at a time and runs it right away. */
export async function shellCommand(container: Container, options: ShellOptions, signal: AbortSignal): Promise<void> {
    const { fs, logger } = container
    const table = await loadLocations(fs, options.locations, logger)
    const interpreter = container.createInterpreter()

    showWelcome('mimic shell')
    console.log(colors.dim(`${table.size} locations loaded. Type "quit" to leave.`))

    while (!signal.aborted) {
        const line = await askCommandLine()
        if (line === null || QUIT_WORDS.has(line.trim().toLowerCase())) break

        const outcome = parseLine(line)
        if (!outcome) continue
        if ('error' in outcome) {
            console.log(colors.error(outcome.error))
            continue
        }
        if (outcome.warning) console.log(colors.warn(outcome.warning))

        try {
            await interpreter.execute(outcome.command, table, signal)
        } catch (error) {
            if (isAbortError(error)) break
            if (!(error instanceof RecoverableError)) throw error
            console.log(colors.warn(`Skipped: ${error.message}`))
        }
    }

    showOutro('Bye')
}
