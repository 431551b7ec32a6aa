import type { Container } from '../../core/container.js'
import { colors } from '../ui.js'

export async function listCommand(container: Container): Promise<void> {
    const recordings = await container.store.list()
    if (recordings.length === 0) {
        console.log(colors.dim(`No recordings in ${container.config.recordingsDir}`))
        return
    }

    for (const { id, info } of recordings) {
        const details = info ? `${info.commands} commands, ${info.duration.toFixed(1)}s` : 'no info.json'
        console.log(`${colors.bold(id.padEnd(8))} ${info?.description ?? ''} ${colors.dim(`(${details})`)}`)
    }
}
