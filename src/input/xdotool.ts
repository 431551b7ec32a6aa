import { execa } from 'execa'
import type { ClickButton, Point } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import type { InputSynthesizer } from './types.js'

const BUTTON_NUMBERS: Record<ClickButton, string> = { left: '1', right: '3' }

const KEYSYMS: Record<string, string> = {
    cmd: 'super',
    ctrl: 'ctrl',
    shift: 'shift',
    option: 'alt',
    return: 'Return',
    tab: 'Tab',
    escape: 'Escape',
    backspace: 'BackSpace',
    delete: 'Delete',
    space: 'space',
    up: 'Up',
    down: 'Down',
    left: 'Left',
    right: 'Right',
    home: 'Home',
    end: 'End',
    pageup: 'Page_Up',
    pagedown: 'Page_Down',
    '-': 'minus',
    '=': 'equal',
    '[': 'bracketleft',
    ']': 'bracketright',
    '\\': 'backslash',
    ';': 'semicolon',
    "'": 'apostrophe',
    '`': 'grave',
    ',': 'comma',
    '.': 'period',
    '/': 'slash',
}

export function toKeysym(key: string): string {
    const mapped = KEYSYMS[key]
    if (mapped) return mapped
    if (/^f\d{1,2}$/.test(key)) return key.toUpperCase()
    return key
}

export function parseMouseLocation(stdout: string): Point {
    const values = new Map(
        stdout
            .split('\n')
            .map((line) => line.split('='))
            .filter((parts): parts is [string, string] => parts.length === 2)
            .map(([key, value]) => [key.trim(), Number(value.trim())])
    )
    return { x: values.get('X') ?? 0, y: values.get('Y') ?? 0 }
}

/** Synthesizes input on X11 by driving the `xdotool` binary. */
export class XdotoolSynthesizer implements InputSynthesizer {
    constructor(
        private logger: Logger,
        private binary = 'xdotool'
    ) {}

    private async run(...args: string[]): Promise<string> {
        this.logger.trace({ args }, 'xdotool')
        const { stdout } = await execa(this.binary, args)
        return stdout
    }

    async cursorPosition(): Promise<Point> {
        return parseMouseLocation(await this.run('getmouselocation', '--shell'))
    }

    async moveTo(point: Point): Promise<void> {
        await this.run('mousemove', String(Math.round(point.x)), String(Math.round(point.y)))
    }

    async mouseDown(button: ClickButton): Promise<void> {
        await this.run('mousedown', BUTTON_NUMBERS[button])
    }

    async mouseUp(button: ClickButton): Promise<void> {
        await this.run('mouseup', BUTTON_NUMBERS[button])
    }

    async keyDown(key: string): Promise<void> {
        await this.run('keydown', toKeysym(key))
    }

    async keyUp(key: string): Promise<void> {
        await this.run('keyup', toKeysym(key))
    }
}
