import { execa } from 'execa'
import type { Clipboard } from './types.js'

interface ClipboardCommands {
    copy: [string, ...string[]]
    paste: [string, ...string[]]
}

const XCLIP: ClipboardCommands = {
    copy: ['xclip', '-selection', 'clipboard'],
    paste: ['xclip', '-selection', 'clipboard', '-o'],
}

const COMMANDS: Partial<Record<NodeJS.Platform, ClipboardCommands>> = {
    darwin: { copy: ['pbcopy'], paste: ['pbpaste'] },
    linux: XCLIP,
}

export function clipboardCommands(platform: NodeJS.Platform = process.platform): ClipboardCommands {
    return COMMANDS[platform] ?? XCLIP
}

/** System clipboard through the platform's command-line tools. */
export class ShellClipboard implements Clipboard {
    constructor(private commands: ClipboardCommands = clipboardCommands()) {}

    async read(): Promise<string> {
        const [file, ...args] = this.commands.paste
        const { stdout } = await execa(file, args)
        return stdout
    }

    async write(text: string): Promise<void> {
        const [file, ...args] = this.commands.copy
        await execa(file, args, { input: text })
    }
}
