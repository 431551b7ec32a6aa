import { type ClickButton, type Modifier, MODIFIER_ORDER, type Point, sortModifiers } from '../core/types.js'
import { RecoverableError, errorMessage, isAbortError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import { type Result, err, ok } from '../core/result.js'
import { type Sleeper, sleep } from '../core/sleep.js'
import type { KeyTable } from '../input/keys.js'
import type { Clipboard, InputSynthesizer } from '../input/types.js'
import type { LocationTable } from '../locations/table.js'
import type { Logger } from '../logger/index.js'
import type { Command, MoveTarget, Script } from '../script/types.js'
import { interpolate } from './motion.js'

/** Delays in seconds, before the speed multiplier is applied. */
export const TIMING = {
    move: 0.3,
    dragMove: 0.5,
    beforeDown: 0.2,
    afterDown: 0.1,
    afterUp: 0.3,
    modifier: 0.01,
    key: 0.02,
    character: 0.02,
    pasteStep: 0.05,
} as const

export interface PlaybackOptions {
    /** Seconds slept after every executed command. */
    commandDelay: number
    speed: number
    pasteModifier: Modifier
    releaseModifiersBeforeRisky: boolean
    riskyCharacters: readonly string[]
}

export interface PlaybackDeps {
    synthesizer: InputSynthesizer
    clipboard: Clipboard
    keys: KeyTable
    logger: Logger
    eventBus?: TypedEventEmitter
    sleep?: Sleeper
}

export interface PlaybackSummary {
    executed: number
    skipped: number
    aborted: boolean
}

export const DEFAULT_PLAYBACK_OPTIONS: PlaybackOptions = {
    commandDelay: 0.1,
    speed: 1,
    pasteModifier: 'cmd',
    releaseModifiersBeforeRisky: true,
    riskyCharacters: ['a', 'c', 'e', 'f', 'n', 'q'],
}

/**
 * Executes commands one after another against the synthesizer. Problems with a
 * single command (an unknown location or key) skip that command only.
 */
export class PlaybackInterpreter {
    private readonly synthesizer: InputSynthesizer
    private readonly clipboard: Clipboard
    private readonly keys: KeyTable
    private readonly logger: Logger
    private readonly eventBus?: TypedEventEmitter
    private readonly sleeper: Sleeper
    private readonly options: PlaybackOptions
    private readonly risky: Set<string>

    constructor(deps: PlaybackDeps, options: Partial<PlaybackOptions> = {}) {
        this.synthesizer = deps.synthesizer
        this.clipboard = deps.clipboard
        this.keys = deps.keys
        this.logger = deps.logger
        this.eventBus = deps.eventBus
        this.sleeper = deps.sleep ?? sleep
        this.options = { ...DEFAULT_PLAYBACK_OPTIONS, ...options }
        this.risky = new Set(this.options.riskyCharacters.map((c) => c.toLowerCase()))
    }

    async run(script: Script, table: LocationTable, signal?: AbortSignal): Promise<PlaybackSummary> {
        const summary: PlaybackSummary = { executed: 0, skipped: 0, aborted: false }

        for (const [index, command] of script.entries()) {
            if (command.kind === 'comment') continue
            if (signal?.aborted) {
                summary.aborted = true
                break
            }

            this.eventBus?.emit('playback:command', { index, command })
            try {
                await this.execute(command, table, signal)
                summary.executed++
                await this.delay(this.options.commandDelay, signal)
            } catch (error) {
                if (isAbortError(error)) {
                    summary.aborted = true
                    break
                }
                if (!(error instanceof RecoverableError)) throw error
                summary.skipped++
                this.logger.warn({ index, kind: command.kind, reason: error.message }, 'playback:skip')
                this.eventBus?.emit('playback:skip', { index, command, reason: error.message })
            }
        }

        this.logger.debug(summary, 'playback:complete')
        this.eventBus?.emit('playback:complete', summary)
        return summary
    }

    /** Runs one command. Throws RecoverableError when it cannot be executed. */
    async execute(command: Command, table: LocationTable, signal?: AbortSignal): Promise<void> {
        this.logger.debug({ command }, 'playback:command')
        switch (command.kind) {
            case 'move':
                return this.moveTo(this.target(command.target, table), TIMING.move, signal)
            case 'click':
                return this.click(command.button, command.location, TIMING.afterDown, table, signal)
            case 'clickAndHold':
                return this.click(command.button, command.location, command.duration, table, signal)
            case 'drag':
                return this.drag(command.button, command.from, command.to, table, signal)
            case 'press':
                return this.press(command.key, command.modifiers, signal)
            case 'type':
                return this.typeText(command.text, signal)
            case 'typeLine':
                await this.typeText(command.text, signal)
                return this.tapKey('return', signal)
            case 'typeCodeBlock':
                for (const line of command.lines) await this.pasteLine(line, signal)
                return
            case 'wait':
                return this.delay(command.seconds, signal)
            case 'comment':
                return
        }
    }

    private delay(seconds: number, signal?: AbortSignal): Promise<void> {
        return this.sleeper((seconds * 1000) / this.options.speed, signal)
    }

    private target(target: MoveTarget, table: LocationTable): Point {
        if (target.type === 'point') return { x: target.x, y: target.y }
        return this.location(target.name, table)
    }

    private location(name: string, table: LocationTable): Point {
        const resolved = resolveLocation(name, table)
        if (!resolved.ok) throw new RecoverableError(resolved.error)
        return resolved.value
    }

    private async moveTo(to: Point, duration: number, signal?: AbortSignal): Promise<void> {
        const from = await this.synthesizer.cursorPosition()
        const points = interpolate(from, to)
        const step = duration / (points.length - 1)
        for (const [i, point] of points.entries()) {
            if (i > 0) await this.delay(step, signal)
            await this.synthesizer.moveTo(point)
        }
    }

    private async click(
        button: ClickButton,
        location: string | undefined,
        hold: number,
        table: LocationTable,
        signal?: AbortSignal
    ): Promise<void> {
        if (location !== undefined) {
            await this.moveTo(this.location(location, table), TIMING.move, signal)
            await this.delay(TIMING.beforeDown, signal)
        }
        await this.synthesizer.mouseDown(button)
        try {
            await this.delay(hold, signal)
        } finally {
            await this.synthesizer.mouseUp(button)
        }
        await this.delay(TIMING.afterUp, signal)
    }

    private async drag(button: ClickButton, from: string, to: string, table: LocationTable, signal?: AbortSignal): Promise<void> {
        const source = this.location(from, table)
        const destination = this.location(to, table)

        await this.moveTo(source, TIMING.move, signal)
        await this.delay(TIMING.beforeDown, signal)
        await this.synthesizer.mouseDown(button)
        try {
            await this.delay(TIMING.afterDown, signal)
            await this.moveTo(destination, TIMING.dragMove, signal)
        } finally {
            await this.synthesizer.mouseUp(button)
        }
        await this.delay(TIMING.afterUp, signal)
    }

    private async press(key: string, modifiers: readonly Modifier[], signal?: AbortSignal): Promise<void> {
        if (!this.keys.isKnownKey(key)) throw new RecoverableError(`Unknown key "${key}"`)

        const held: Modifier[] = []
        try {
            for (const modifier of sortModifiers(modifiers)) {
                await this.synthesizer.keyDown(modifier)
                held.push(modifier)
                await this.delay(TIMING.modifier, signal)
            }
            await this.tapKey(key, signal)
            for (let modifier = held.pop(); modifier !== undefined; modifier = held.pop()) {
                await this.synthesizer.keyUp(modifier)
                await this.delay(TIMING.modifier, signal)
            }
        } finally {
            // non-empty only when a delay was aborted mid-press
            for (const modifier of held.reverse()) await this.synthesizer.keyUp(modifier)
        }
    }

    private async tapKey(key: string, signal?: AbortSignal): Promise<void> {
        await this.synthesizer.keyDown(key)
        try {
            await this.delay(TIMING.key, signal)
        } finally {
            await this.synthesizer.keyUp(key)
        }
        await this.delay(TIMING.key, signal)
    }

    private async releaseModifiers(): Promise<void> {
        for (const modifier of MODIFIER_ORDER) await this.synthesizer.keyUp(modifier)
    }

    private async typeText(text: string, signal?: AbortSignal): Promise<void> {
        for (const char of text) {
            const stroke = this.keys.keystrokeFor(char)
            if (!stroke) {
                this.logger.warn({ char }, 'Cannot type character')
                continue
            }
            if (this.options.releaseModifiersBeforeRisky && this.risky.has(char.toLowerCase())) {
                await this.releaseModifiers()
            }
            await (stroke.shift ? this.press(stroke.key, ['shift'], signal) : this.tapKey(stroke.key, signal))
            await this.delay(TIMING.character, signal)
        }
    }

    private async pasteLine(line: string, signal?: AbortSignal): Promise<void> {
        try {
            await this.clipboard.write(line.replace(/[ \t]+$/, ''))
        } catch (error) {
            throw new RecoverableError(`Clipboard write failed: ${errorMessage(error)}`, { cause: error })
        }
        await this.delay(TIMING.pasteStep, signal)
        await this.tapKey('home', signal)
        await this.delay(TIMING.pasteStep, signal)
        await this.press('v', [this.options.pasteModifier], signal)
        await this.delay(TIMING.pasteStep, signal)
        await this.tapKey('return', signal)
        await this.delay(TIMING.pasteStep, signal)
    }
}

export function resolveLocation(name: string, table: LocationTable): Result<Point> {
    const point = table.get(name)
    return point ? ok(point) : err(`Unknown location "${name}"`)
}
