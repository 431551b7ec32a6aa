import pino from 'pino'
import type { ClickButton, Point } from '../../src/core/types.js'
import type { Sleeper } from '../../src/core/sleep.js'
import type {
    Clipboard,
    InputEvent,
    InputListener,
    InputSource,
    InputSynthesizer,
    ModifierState,
} from '../../src/input/types.js'
import { NO_MODIFIERS } from '../../src/input/types.js'
import type { Logger } from '../../src/logger/index.js'

export const silentLogger: Logger = pino({ level: 'silent' })

export type SynthCall =
    | { type: 'move'; point: Point }
    | { type: 'down' | 'up'; button: ClickButton }
    | { type: 'keyDown' | 'keyUp'; key: string }

/** Records every synthesized event; the cursor follows `moveTo`. */
export class FakeSynthesizer implements InputSynthesizer {
    readonly calls: SynthCall[] = []

    constructor(public cursor: Point = { x: 0, y: 0 }) {}

    async cursorPosition(): Promise<Point> {
        return { ...this.cursor }
    }

    async moveTo(point: Point): Promise<void> {
        this.cursor = { ...point }
        this.calls.push({ type: 'move', point: { ...point } })
    }

    async mouseDown(button: ClickButton): Promise<void> {
        this.calls.push({ type: 'down', button })
    }

    async mouseUp(button: ClickButton): Promise<void> {
        this.calls.push({ type: 'up', button })
    }

    async keyDown(key: string): Promise<void> {
        this.calls.push({ type: 'keyDown', key })
    }

    async keyUp(key: string): Promise<void> {
        this.calls.push({ type: 'keyUp', key })
    }

    /** Calls other than cursor moves, written as `down:left`, `keyDown:cmd`... */
    actions(): string[] {
        return this.calls.flatMap((call) => {
            if (call.type === 'move') return []
            return [`${call.type}:${'button' in call ? call.button : call.key}`]
        })
    }

    moves(): Point[] {
        return this.calls.flatMap((call) => (call.type === 'move' ? [call.point] : []))
    }
}

export class FakeClipboard implements Clipboard {
    readonly writes: string[] = []
    text = ''

    async read(): Promise<string> {
        return this.text
    }

    async write(text: string): Promise<void> {
        this.text = text
        this.writes.push(text)
    }
}

/** Input source driven by the test through `emit`. */
export class FakeInputSource implements InputSource {
    private listeners = new Set<InputListener>()
    started = false

    async start(): Promise<void> {
        this.started = true
    }

    async stop(): Promise<void> {
        this.started = false
    }

    subscribe(listener: InputListener): () => void {
        this.listeners.add(listener)
        return () => {
            this.listeners.delete(listener)
        }
    }

    emit(event: InputEvent): void {
        for (const listener of this.listeners) listener(event)
    }

    get listenerCount(): number {
        return this.listeners.size
    }
}

/** Sleeper that returns at once and remembers every requested delay in ms. */
export function recordingSleeper(): Sleeper & { delays: number[] } {
    const delays: number[] = []
    const sleeper = async (ms: number, signal?: AbortSignal) => {
        delays.push(ms)
        if (signal?.aborted) {
            const error = new Error('Aborted')
            error.name = 'AbortError'
            throw error
        }
    }
    return Object.assign(sleeper, { delays })
}

export const mouseDown = (button: 'left' | 'right' | 'middle', x: number, y: number, time: number): InputEvent => ({
    type: 'mouseDown',
    button,
    x,
    y,
    time,
})

export const mouseUp = (button: 'left' | 'right' | 'middle', x: number, y: number, time: number): InputEvent => ({
    type: 'mouseUp',
    button,
    x,
    y,
    time,
})

export const keyDown = (keycode: number, time: number, modifiers: Partial<ModifierState> = {}): InputEvent => ({
    type: 'keyDown',
    keycode,
    modifiers: { ...NO_MODIFIERS, ...modifiers },
    time,
})

export const keyUp = (keycode: number, time: number): InputEvent => ({
    type: 'keyUp',
    keycode,
    modifiers: NO_MODIFIERS,
    time,
})

/** libuiohook keycodes used across the tests. */
export const KEY = {
    a: 30,
    e: 18,
    h: 35,
    i: 23,
    l: 38,
    o: 24,
    s: 31,
    v: 47,
    one: 2,
    space: 57,
    return: 28,
    backspace: 14,
    tab: 15,
    f1: 59,
    shift: 42,
    cmd: 3675,
} as const
