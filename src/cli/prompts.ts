import * as clack from '@clack/prompts'
import type { RecordingSummary } from '../recorder/store.js'
import { colors } from './ui.js'

export async function confirmAction(message: string): Promise<boolean> {
    const result = await clack.confirm({ message })
    if (clack.isCancel(result)) return false
    return result
}

export async function askCommandLine(): Promise<string | null> {
    const result = await clack.text({
        message: 'Command',
        placeholder: 'left click at click_1',
    })

    if (clack.isCancel(result)) return null
    return result
}

export async function selectRecording(recordings: RecordingSummary[]): Promise<string | null> {
    const result = await clack.select({
        message: 'Select a recording',
        options: recordings.map((r) => ({
            value: r.id,
            label: r.id,
            hint: r.info?.description,
        })),
    })

    if (clack.isCancel(result)) return null
    return result
}

export function showWelcome(title: string): void {
    clack.intro(colors.brand(title))
}

export function showOutro(message: string): void {
    clack.outro(message)
}
