import { type ClickButton, type Modifier, sortModifiers } from '../core/types.js'
import type { Command, MoveCommand, PressCommand, Script } from './types.js'

export const moveTo = (name: string): MoveCommand => ({ kind: 'move', target: { type: 'location', name } })

export const moveToPoint = (x: number, y: number): MoveCommand => ({ kind: 'move', target: { type: 'point', x, y } })

export const click = (button: ClickButton, location?: string): Command =>
    location === undefined ? { kind: 'click', button } : { kind: 'click', button, location }

export const clickAndHold = (button: ClickButton, duration: number, location?: string): Command =>
    location === undefined
        ? { kind: 'clickAndHold', button, duration }
        : { kind: 'clickAndHold', button, location, duration }

export const drag = (button: ClickButton, from: string, to: string): Command => ({ kind: 'drag', button, from, to })

export const press = (key: string, modifiers: Iterable<Modifier> = []): PressCommand => ({
    kind: 'press',
    modifiers: sortModifiers(modifiers),
    key,
})

export const type = (text: string): Command => ({ kind: 'type', text })

export const typeLine = (text: string): Command => ({ kind: 'typeLine', text })

export const typeCodeBlock = (lines: readonly string[]): Command => ({ kind: 'typeCodeBlock', lines: [...lines] })

export const wait = (seconds: number): Command => ({ kind: 'wait', seconds })

export const comment = (text: string): Command => ({ kind: 'comment', text })

/** Location names a command refers to, in argument order. */
export function commandLocations(command: Command): string[] {
    switch (command.kind) {
        case 'move':
            return command.target.type === 'location' ? [command.target.name] : []
        case 'click':
        case 'clickAndHold':
            return command.location === undefined ? [] : [command.location]
        case 'drag':
            return [command.from, command.to]
        default:
            return []
    }
}

/** Every location name the script references, each once, in first-reference order. */
export function referencedLocations(script: Script): string[] {
    const seen = new Set<string>()
    for (const command of script) {
        for (const name of commandLocations(command)) seen.add(name)
    }
    return [...seen]
}

/** Commands that synthesize input, i.e. everything but comments. */
export function countActions(script: Script): number {
    return script.filter((c) => c.kind !== 'comment').length
}
