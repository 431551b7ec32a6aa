import { type Point, distance } from '../core/types.js'

export const MIN_STEPS = 10
export const MAX_STEPS = 30
/** Pixels covered by one step before clamping. */
const PIXELS_PER_STEP = 10

export function stepCount(from: Point, to: Point): number {
    const steps = Math.floor(distance(from, to) / PIXELS_PER_STEP)
    return Math.min(MAX_STEPS, Math.max(MIN_STEPS, steps))
}

/**
 * Evenly spaced points from `from` to `to`, both ends included, rounded to
 * whole pixels.
 */
export function interpolate(from: Point, to: Point, steps = stepCount(from, to)): Point[] {
    const points: Point[] = []
    for (let i = 0; i <= steps; i++) {
        const t = i / steps
        points.push({
            x: Math.round(from.x + (to.x - from.x) * t),
            y: Math.round(from.y + (to.y - from.y) * t),
        })
    }
    return points
}
