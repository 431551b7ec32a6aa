import { performance } from 'node:perf_hooks'
import { type UiohookKeyboardEvent, type UiohookMouseEvent, uIOhook } from 'uiohook-napi'
import { ACCESSIBILITY_HINT, FatalError, errorMessage } from '../core/errors.js'
import type { MouseButton } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import type { InputEvent, InputListener, InputSource, ModifierState } from './types.js'

// libuiohook button numbers
const BUTTONS: Record<number, MouseButton> = { 1: 'left', 2: 'right', 3: 'middle' }

function modifierState(event: UiohookKeyboardEvent): ModifierState {
    return { cmd: event.metaKey, ctrl: event.ctrlKey, shift: event.shiftKey, option: event.altKey }
}

/** Global input tap backed by libuiohook. Events cannot be swallowed, only observed. */
export class UiohookInputSource implements InputSource {
    private listeners = new Set<InputListener>()
    private running = false

    constructor(
        private logger: Logger,
        private now: () => number = () => performance.now() / 1000
    ) {}

    private readonly onMouse = (type: 'mouseDown' | 'mouseUp') => (event: UiohookMouseEvent) => {
        const button = typeof event.button === 'number' ? BUTTONS[event.button] : undefined
        if (!button) return
        this.dispatch({ type, button, x: Math.round(event.x), y: Math.round(event.y), time: this.now() })
    }

    private readonly onKey = (type: 'keyDown' | 'keyUp') => (event: UiohookKeyboardEvent) => {
        this.dispatch({ type, keycode: event.keycode, modifiers: modifierState(event), time: this.now() })
    }

    private readonly handlers = {
        mousedown: this.onMouse('mouseDown'),
        mouseup: this.onMouse('mouseUp'),
        keydown: this.onKey('keyDown'),
        keyup: this.onKey('keyUp'),
    }

    private dispatch(event: InputEvent): void {
        for (const listener of this.listeners) {
            try {
                listener(event)
            } catch (error) {
                this.logger.error({ error: errorMessage(error), event }, 'input:listener-error')
            }
        }
    }

    async start(): Promise<void> {
        if (this.running) return
        uIOhook.on('mousedown', this.handlers.mousedown)
        uIOhook.on('mouseup', this.handlers.mouseup)
        uIOhook.on('keydown', this.handlers.keydown)
        uIOhook.on('keyup', this.handlers.keyup)
        try {
            uIOhook.start()
        } catch (error) {
            this.detach()
            throw new FatalError(`Failed to start the input tap: ${errorMessage(error)}`, {
                cause: error,
                hint: ACCESSIBILITY_HINT,
            })
        }
        this.running = true
        this.logger.debug('input:tap-started')
    }

    async stop(): Promise<void> {
        if (!this.running) return
        this.running = false
        this.detach()
        uIOhook.stop()
        this.logger.debug('input:tap-stopped')
    }

    subscribe(listener: InputListener): () => void {
        this.listeners.add(listener)
        return () => {
            this.listeners.delete(listener)
        }
    }

    private detach(): void {
        uIOhook.off('mousedown', this.handlers.mousedown)
        uIOhook.off('mouseup', this.handlers.mouseup)
        uIOhook.off('keydown', this.handlers.keydown)
        uIOhook.off('keyup', this.handlers.keyup)
    }
}
