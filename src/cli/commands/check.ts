import type { Container } from '../../core/container.js'
import { referencedLocations } from '../../script/commands.js'
import type { Script } from '../../script/types.js'
import type { KeyTable } from '../../input/keys.js'
import { colors, formatDiagnostic } from '../ui.js'
import { loadOrExplain } from './play.js'

export interface CheckOptions {
    locations?: string
}

export function unknownKeys(script: Script, keys: KeyTable): string[] {
    const unknown = new Set<string>()
    for (const command of script) {
        if (command.kind === 'press' && !keys.isKnownKey(command.key)) unknown.add(command.key)
    }
    return [...unknown]
}

/** Parses a script without running it and reports everything playback would skip. */
export async function checkCommand(container: Container, idOrFile: string, options: CheckOptions): Promise<void> {
    const recording = await loadOrExplain(container, idOrFile)
    if (!recording) return

    const table = await container.store.loadTable(recording.paths, options.locations)
    const missing = referencedLocations(recording.commands).filter((name) => !table.has(name))
    const badKeys = unknownKeys(recording.commands, container.keys)

    for (const diagnostic of recording.diagnostics) console.log(formatDiagnostic(diagnostic))
    for (const name of missing) console.log(`${colors.warn('unknown location:')} ${name}`)
    for (const key of badKeys) console.log(`${colors.warn('unknown key:')} ${key}`)

    const problems = recording.diagnostics.length + missing.length + badKeys.length
    if (problems === 0) {
        console.log(colors.success(`OK: ${recording.commands.length} commands, ${table.size} locations`))
        return
    }
    console.log(colors.warn(`${problems} problem(s) found.`))
    process.exitCode = 1
}
