import { quote } from './lexer.js'
import { CODE_FENCE, type Command, type Script } from './types.js'

function formatSeconds(seconds: number): string {
    return String(Math.round(seconds * 1000) / 1000)
}

function serializeTarget(command: Extract<Command, { kind: 'move' }>): string {
    const { target } = command
    return target.type === 'location' ? target.name : `(${target.x}, ${target.y})`
}

/** Renders one command as script text. Code blocks span several lines. */
export function serializeCommand(command: Command): string {
    switch (command.kind) {
        case 'move':
            return `move mouse to ${serializeTarget(command)}`
        case 'click':
            return command.location === undefined
                ? `${command.button} click`
                : `${command.button} click at ${command.location}`
        case 'clickAndHold': {
            const at = command.location === undefined ? '' : ` at ${command.location}`
            return `${command.button} click and hold${at} for ${formatSeconds(command.duration)}s`
        }
        case 'drag':
            return `drag ${command.button} from ${command.from} to ${command.to}`
        case 'press':
            return `press ${[...command.modifiers, command.key].join('+')}`
        case 'type':
            return `type ${quote(command.text)}`
        case 'typeLine':
            return `type line ${quote(command.text)}`
        case 'typeCodeBlock':
            return ['type code block', CODE_FENCE, ...command.lines, CODE_FENCE].join('\n')
        case 'wait':
            return `wait ${formatSeconds(command.seconds)}`
        case 'comment':
            return command.text ? `# ${command.text}` : '#'
    }
}

export function serializeScript(script: Script): string {
    return script.map(serializeCommand).join('\n')
}
