import path from 'node:path'
import type { Container } from '../../core/container.js'
import type { LocationTable } from '../../locations/table.js'
import { Remapper } from '../../remap/remapper.js'
import { referencedLocations } from '../../script/commands.js'
import { createProgressReporter } from '../progress.js'
import { confirmAction, showOutro, showWelcome } from '../prompts.js'
import { colors } from '../ui.js'
import { loadOrExplain } from './play.js'

export async function remapCommand(container: Container, id: string, targetDir: string, signal: AbortSignal): Promise<void> {
    const { config, logger, eventBus, fs, store, synthesizer } = container
    const recording = await loadOrExplain(container, id)
    if (!recording) return

    const target = path.resolve(targetDir)
    if ((await fs.exists(target)) && !(await confirmAction(`${target} already exists. Overwrite its files?`))) {
        showOutro(colors.warn('Remap cancelled.'))
        return
    }

    const oldTable = await store.loadTable(recording.paths)
    const referenced = referencedLocations(recording.commands)
    showWelcome(`mimic remap ${id}`)
    console.log(colors.dim(`${referenced.length} locations to confirm. Ctrl-C cancels without writing anything.`))

    const source = await container.inputSource()
    const remapper = new Remapper({ logger, synthesizer, eventBus, triggerButton: config.triggerButton })
    const unsubscribe = source.subscribe(remapper.listener)
    const progress = createProgressReporter(eventBus)

    let table: LocationTable
    try {
        await source.start()
        table = await remapper.remap(recording.commands, oldTable, signal)
    } finally {
        progress.dispose()
        unsubscribe()
        remapper.close()
        await source.stop()
    }

    const saved = await store.saveRemapped(recording.paths, target, table)
    showOutro(`${colors.success(`Remapped ${table.size} locations`)} ${colors.dim(`into ${saved.dir}`)}`)
}
