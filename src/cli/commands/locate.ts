import type { Container } from '../../core/container.js'
import { loadLocations } from '../../locations/store.js'
import { colors, formatPoint } from '../ui.js'

export interface LocateOptions {
    locations?: string
}

/** Prints the position of every click until cancelled. */
export async function locateCommand(container: Container, options: LocateOptions, signal: AbortSignal): Promise<void> {
    const { config, fs, logger } = container
    const table = await loadLocations(fs, options.locations, logger)
    const source = await container.inputSource()

    console.log(colors.dim('Click anywhere to print its position. Ctrl-C to quit.'))
    const unsubscribe = source.subscribe((event) => {
        if (event.type !== 'mouseDown') return
        const point = { x: event.x, y: event.y }
        const nearest = table.findNearest(point.x, point.y, config.matchThreshold)
        const match = nearest ? ` ${colors.dim('near')} ${colors.location(nearest)}` : ''
        console.log(`${event.button.padEnd(6)} ${formatPoint(point)}${match}`)
    })

    try {
        await source.start()
        await new Promise<void>((resolve) => {
            if (signal.aborted) return resolve()
            signal.addEventListener('abort', () => resolve(), { once: true })
        })
    } finally {
        unsubscribe()
        await source.stop()
    }
}
