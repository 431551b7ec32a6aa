import type { TypedEventEmitter } from '../core/events.js'
import type { ClickButton, Modifier, MouseButton } from '../core/types.js'
import type { KeyTable } from '../input/keys.js'
import type { InputEvent, KeyEvent, MouseEvent } from '../input/types.js'
import { DEFAULT_MATCH_THRESHOLD, type LocationTable } from '../locations/table.js'
import type { Logger } from '../logger/index.js'
import * as cmd from '../script/commands.js'
import type { Command } from '../script/types.js'

/** Idle time after which buffered text is flushed and a wait is recorded. */
export const PAUSE_THRESHOLD = 0.5
/** Holds longer than this become click-and-hold or drag. */
export const HOLD_THRESHOLD = 0.5
/** Fixed delay recorded after clicks and return presses. */
export const SETTLE_WAIT = 0.25

export type EncoderState = 'idle' | 'active'

export interface FinishedRecording {
    commands: Command[]
    startedAt: number
    stoppedAt: number
    /** Seconds between the start and stop triggers. */
    duration: number
    newLocations: number
}

export interface EncoderOptions {
    keys: KeyTable
    logger: Logger
    eventBus?: TypedEventEmitter
    threshold?: number
    triggerButton?: MouseButton
}

interface PendingMouseDown {
    time: number
    button: ClickButton
    location: string
}

/**
 * Compresses an idle gap into one of three short playback delays.
 * Returns undefined when the gap is not a pause.
 */
export function quantizeGap(gap: number): number | undefined {
    if (gap <= PAUSE_THRESHOLD) return undefined
    if (gap >= 2.0) return 0.6
    if (gap >= 1.0) return 0.4
    return 0.25
}

/** Command for a flushed text buffer; multi-line text becomes a code block. */
export function textToCommand(text: string): Command | undefined {
    if (!text.trim()) return undefined
    const body = text.replace(/^\n+|\n+$/g, '')
    if (!body.includes('\n')) return cmd.type(body)
    return cmd.typeCodeBlock(body.split('\n'))
}

function activeModifiers(event: KeyEvent): Modifier[] {
    const { cmd: command, ctrl, shift, option } = event.modifiers
    const present: Modifier[] = []
    if (command) present.push('cmd')
    if (ctrl) present.push('ctrl')
    if (shift) present.push('shift')
    if (option) present.push('option')
    return present
}

/**
 * Turns a live input stream into script commands.
 *
 * `handle` runs synchronously for every delivered event and never blocks; it
 * returns the finished recording when the trigger stops a session. Saving the
 * result is left to the caller.
 */
export class RecordingEncoder {
    private state: EncoderState = 'idle'
    private commands: Command[] = []
    private textBuffer = ''
    private startedAt = 0
    private lastEventTime = 0
    private pendingDown: PendingMouseDown | undefined
    private lastClickLocation: string | undefined

    private readonly keys: KeyTable
    private readonly logger: Logger
    private readonly eventBus?: TypedEventEmitter
    private readonly threshold: number
    private readonly triggerButton: MouseButton

    constructor(
        private table: LocationTable,
        options: EncoderOptions
    ) {
        this.keys = options.keys
        this.logger = options.logger
        this.eventBus = options.eventBus
        this.threshold = options.threshold ?? DEFAULT_MATCH_THRESHOLD
        this.triggerButton = options.triggerButton ?? 'middle'
    }

    get active(): boolean {
        return this.state === 'active'
    }

    /** Commands recorded so far in the current session. */
    get recorded(): readonly Command[] {
        return this.commands
    }

    get bufferedText(): string {
        return this.textBuffer
    }

    handle(event: InputEvent): FinishedRecording | undefined {
        if ((event.type === 'mouseDown' || event.type === 'mouseUp') && event.button === this.triggerButton) {
            if (event.type === 'mouseUp') return undefined
            if (this.state === 'idle') {
                this.start(event.time)
                return undefined
            }
            return this.stop(event.time)
        }

        if (this.state === 'idle') return undefined

        this.trackGap(event.time)

        switch (event.type) {
            case 'mouseDown':
                this.onMouseDown(event)
                break
            case 'mouseUp':
                this.onMouseUp(event)
                break
            case 'keyDown':
                this.onKeyDown(event)
                break
            case 'keyUp':
                break
        }
        return undefined
    }

    start(time: number): void {
        this.state = 'active'
        this.commands = []
        this.textBuffer = ''
        this.startedAt = time
        this.lastEventTime = time
        this.pendingDown = undefined
        this.lastClickLocation = undefined
        this.table.reset()
        this.logger.debug({ time }, 'recording:start')
        this.eventBus?.emit('recording:start', { startedAt: time })
    }

    stop(time: number): FinishedRecording {
        this.flushText()
        this.state = 'idle'
        this.pendingDown = undefined

        const recording: FinishedRecording = {
            commands: this.commands,
            startedAt: this.startedAt,
            stoppedAt: time,
            duration: Math.max(0, time - this.startedAt),
            newLocations: this.table.createdCount,
        }
        this.commands = []
        this.logger.debug({ commands: recording.commands.length }, 'recording:stop')
        this.eventBus?.emit('recording:stop', {
            commands: recording.commands.length,
            newLocations: recording.newLocations,
            duration: recording.duration,
        })
        return recording
    }

    private trackGap(time: number): void {
        const wait = quantizeGap(time - this.lastEventTime)
        if (wait !== undefined) {
            this.flushText()
            if (this.commands.length > 0) this.emit(cmd.wait(wait), time)
        }
        this.lastEventTime = time
    }

    private emit(command: Command, time = this.lastEventTime): void {
        this.commands.push(command)
        this.eventBus?.emit('recording:command', { command, elapsed: time - this.startedAt })
    }

    private flushText(): void {
        const command = textToCommand(this.textBuffer)
        this.textBuffer = ''
        if (command) this.emit(command)
    }

    private locate(event: MouseEvent): string {
        const { name, created } = this.table.resolveOrRegister(event.x, event.y, this.threshold)
        if (created) {
            this.eventBus?.emit('recording:location', {
                name,
                point: { x: event.x, y: event.y },
                elapsed: event.time - this.startedAt,
            })
        }
        return name
    }

    private onMouseDown(event: MouseEvent): void {
        if (event.button === 'middle') return
        this.flushText()

        const location = this.locate(event)
        if (this.lastClickLocation !== undefined && this.lastClickLocation !== location) {
            this.emit(cmd.moveTo(location), event.time)
        }
        this.pendingDown = { time: event.time, button: event.button, location }
    }

    private onMouseUp(event: MouseEvent): void {
        const down = this.pendingDown
        if (!down || event.button === 'middle') return

        const upLocation = this.locate(event)
        const hold = event.time - down.time

        let command: Command
        if (hold > HOLD_THRESHOLD && down.location === upLocation) {
            command = cmd.clickAndHold(down.button, Math.round(hold * 10) / 10, down.location)
        } else if (hold > HOLD_THRESHOLD) {
            command = cmd.drag(down.button, down.location, upLocation)
        } else {
            command = cmd.click(down.button, down.location)
        }

        this.emit(command, event.time)
        this.emit(cmd.wait(SETTLE_WAIT), event.time)
        this.lastClickLocation = upLocation
        this.pendingDown = undefined
    }

    private onKeyDown(event: KeyEvent): void {
        const { keycode } = event
        if ((event.modifiers.cmd || event.modifiers.ctrl) && !this.keys.isModifierKey(keycode)) {
            const key = this.keys.keyName(keycode)
            if (key === undefined) return
            this.flushText()
            this.emit(cmd.press(key, activeModifiers(event)), event.time)
            return
        }

        const decoded = this.keys.decode(keycode, event.modifiers.shift)
        if (!decoded || decoded.type === 'modifier') return

        if (decoded.type === 'character') {
            this.textBuffer += decoded.char
            return
        }

        if (decoded.name === 'backspace' && this.textBuffer) {
            this.textBuffer = this.textBuffer.slice(0, -1)
            return
        }

        this.flushText()
        this.emit(cmd.press(decoded.name), event.time)
        if (decoded.name === 'return') this.emit(cmd.wait(SETTLE_WAIT), event.time)
    }
}
