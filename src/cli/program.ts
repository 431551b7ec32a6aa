import { Command, InvalidArgumentError } from 'commander'
import { loadConfig } from '../config/loader.js'
import { type Container, createContainer } from '../core/container.js'
import { FatalError, errorMessage, isAbortError } from '../core/errors.js'
import { NodeFileSystem } from '../core/fs.js'
import { checkCommand } from './commands/check.js'
import { doctorCommand } from './commands/doctor.js'
import { listCommand } from './commands/list.js'
import { locateCommand } from './commands/locate.js'
import { playCommand } from './commands/play.js'
import { recordCommand } from './commands/record.js'
import { remapCommand } from './commands/remap.js'
import { shellCommand } from './commands/shell.js'
import { onInterrupt } from './interrupt.js'
import { VERSION, banner, colors, formatError } from './ui.js'

interface GlobalOptions {
    debug?: boolean
}

type Action = (container: Container, signal: AbortSignal) => Promise<void>

function parseNumber(value: string): number {
    const parsed = Number.parseFloat(value)
    if (!Number.isFinite(parsed) || parsed < 0) throw new InvalidArgumentError('Expected a non-negative number.')
    return parsed
}

function parsePositive(value: string): number {
    const parsed = parseNumber(value)
    if (parsed === 0) throw new InvalidArgumentError('Expected a number above zero.')
    return parsed
}

/**
 * Builds the container, wires Ctrl-C to an abort signal and turns errors into
 * an exit code.
 */
async function run(program: Command, action: Action): Promise<void> {
    const { debug } = program.opts<GlobalOptions>()
    const interrupt = onInterrupt()
    let container: Container | undefined
    try {
        const config = await loadConfig({
            fs: new NodeFileSystem(),
            cliFlags: { logLevel: debug ? 'debug' : undefined },
        })
        container = createContainer(config)
        await action(container, interrupt.signal)
    } catch (error) {
        if (isAbortError(error)) {
            console.log(colors.warn('Cancelled.'))
            process.exitCode = 130
        } else {
            const hint = error instanceof FatalError ? error.hint : undefined
            console.error(formatError(errorMessage(error), hint))
            container?.logger.debug({ error }, 'command:failed')
            process.exitCode = 1
        }
    } finally {
        interrupt.dispose()
        await container?.shutdown()
    }
}

export function createProgram(): Command {
    const program = new Command()

    program
        .name('mimic')
        .description('Record mouse and keyboard macros as editable scripts and play them back')
        .version(VERSION)
        .option('--debug', 'Enable debug logging')
        .addHelpText('beforeAll', `${banner()}\n`)

    program
        .command('record')
        .description('Record a new macro; the trigger button starts and stops it')
        .option('-l, --locations <file>', 'Existing locations to match clicks against')
        .action((options: { locations?: string }) =>
            run(program, (container, signal) => recordCommand(container, options, signal))
        )

    program
        .command('play [idOrFile]')
        .description('Play a recording by id or a script file')
        .option('-l, --locations <file>', 'Locations file to use instead of the recording\'s own')
        .option('-d, --delay <secs>', 'Delay after every command', parseNumber)
        .option('-s, --speed <n>', 'Speed multiplier for every delay', parsePositive)
        .option('-c, --countdown', 'Start after a countdown instead of the start key')
        .action((idOrFile: string | undefined, options: { locations?: string; delay?: number; speed?: number; countdown?: boolean }) =>
            run(program, (container, signal) => playCommand(container, idOrFile, options, signal))
        )

    program
        .command('remap <id> <targetDir>')
        .description('Re-capture the locations of a recording for another screen')
        .action((id: string, targetDir: string) =>
            run(program, (container, signal) => remapCommand(container, id, targetDir, signal))
        )

    program
        .command('list')
        .description('List recordings')
        .action(() => run(program, (container) => listCommand(container)))

    program
        .command('locate')
        .description('Print the position of every click')
        .option('-l, --locations <file>', 'Show the nearest saved location')
        .action((options: { locations?: string }) =>
            run(program, (container, signal) => locateCommand(container, options, signal))
        )

    program
        .command('shell')
        .description('Type script commands and run them one at a time')
        .option('-l, --locations <file>', 'Locations file')
        .action((options: { locations?: string }) =>
            run(program, (container, signal) => shellCommand(container, options, signal))
        )

    program
        .command('check <idOrFile>')
        .description('Parse a script and report problems without running it')
        .option('-l, --locations <file>', 'Locations file to check names against')
        .action((idOrFile: string, options: { locations?: string }) =>
            run(program, (container) => checkCommand(container, idOrFile, options))
        )

    program.command('doctor').description('Check the tools playback and recording need').action(doctorCommand)

    return program
}
