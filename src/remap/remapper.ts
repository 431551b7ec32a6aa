import { Channel } from '../core/channel.js'
import { errorMessage } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { MouseButton, Point } from '../core/types.js'
import type { InputEvent, InputSynthesizer } from '../input/types.js'
import { LocationTable } from '../locations/table.js'
import type { Logger } from '../logger/index.js'
import { referencedLocations } from '../script/commands.js'
import type { Script } from '../script/types.js'

export type Confirmation = { type: 'adopt'; point: Point } | { type: 'keep' }

export interface RemapperOptions {
    logger: Logger
    /** Moves the cursor to each original point; skipped when absent. */
    synthesizer?: InputSynthesizer
    eventBus?: TypedEventEmitter
    triggerButton?: MouseButton
}

/**
 * Builds a location table for a different screen by asking the user to click
 * each referenced location anew.
 *
 * The input listener and the remap loop only share the confirmation channel.
 * Confirmations that arrive while no location is awaiting one are discarded.
 */
export class Remapper {
    private readonly channel = new Channel<Confirmation>(1)
    private readonly logger: Logger
    private readonly synthesizer?: InputSynthesizer
    private readonly eventBus?: TypedEventEmitter
    private readonly triggerButton: MouseButton

    constructor(options: RemapperOptions) {
        this.logger = options.logger
        this.synthesizer = options.synthesizer
        this.eventBus = options.eventBus
        this.triggerButton = options.triggerButton ?? 'middle'
    }

    /** Input source listener: a left click adopts its position, the trigger keeps the original. */
    readonly listener = (event: InputEvent): void => {
        if (event.type !== 'mouseDown') return
        if (event.button === this.triggerButton) {
            this.confirm({ type: 'keep' })
        } else if (event.button === 'left') {
            this.confirm({ type: 'adopt', point: { x: event.x, y: event.y } })
        }
    }

    confirm(confirmation: Confirmation): boolean {
        return this.channel.send(confirmation)
    }

    async remap(script: Script, oldTable: LocationTable, signal?: AbortSignal): Promise<LocationTable> {
        const table = new LocationTable()
        const referenced = referencedLocations(script)

        for (const [index, name] of referenced.entries()) {
            const original = oldTable.get(name)
            this.eventBus?.emit('remap:target', { name, original, index, total: referenced.length })
            if (original) await this.indicate(original)

            this.channel.drain()
            const confirmation = await this.channel.receive(signal)

            if (confirmation.type === 'adopt') {
                table.set(name, confirmation.point)
                this.eventBus?.emit('remap:resolved', { name, point: confirmation.point, kept: false })
            } else {
                if (original) table.set(name, original)
                this.eventBus?.emit('remap:resolved', { name, point: original, kept: true })
            }
            this.logger.debug({ name, confirmation }, 'remap:resolved')
        }

        const visited = new Set(referenced)
        for (const location of oldTable.entries()) {
            if (!visited.has(location.name)) table.set(location.name, location)
        }
        return table
    }

    close(): void {
        this.channel.close()
    }

    private async indicate(point: Point): Promise<void> {
        if (!this.synthesizer) return
        try {
            await this.synthesizer.moveTo(point)
        } catch (error) {
            this.logger.warn({ point, error: errorMessage(error) }, 'Could not move the cursor to the original location')
        }
    }
}
