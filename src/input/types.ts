import type { ClickButton, Modifier, MouseButton, Point } from '../core/types.js'

export type ModifierState = Readonly<Record<Modifier, boolean>>

export const NO_MODIFIERS: ModifierState = { cmd: false, ctrl: false, shift: false, option: false }

/** Input events as delivered by an input source. `time` is in seconds. */
export type InputEvent =
    | { type: 'mouseDown' | 'mouseUp'; button: MouseButton; x: number; y: number; time: number }
    | { type: 'keyDown' | 'keyUp'; keycode: number; modifiers: ModifierState; time: number }

export type MouseEvent = Extract<InputEvent, { type: 'mouseDown' | 'mouseUp' }>
export type KeyEvent = Extract<InputEvent, { type: 'keyDown' | 'keyUp' }>

export type InputListener = (event: InputEvent) => void

/** System-wide input tap. Listeners run synchronously for every event. */
export interface InputSource {
    start(): Promise<void>
    stop(): Promise<void>
    subscribe(listener: InputListener): () => void
}

/** Posts synthetic input. Delivery is best effort and unacknowledged. */
export interface InputSynthesizer {
    cursorPosition(): Promise<Point>
    moveTo(point: Point): Promise<void>
    mouseDown(button: ClickButton): Promise<void>
    mouseUp(button: ClickButton): Promise<void>
    /** `key` is a key name from the key table or a modifier name. */
    keyDown(key: string): Promise<void>
    keyUp(key: string): Promise<void>
}

export interface Clipboard {
    read(): Promise<string>
    write(text: string): Promise<void>
}
