import { type Point, distance } from '../core/types.js'

export interface Location extends Point {
    name: string
}

export const DEFAULT_MATCH_THRESHOLD = 20

const AUTO_NAME_PREFIX = 'click_'

/**
 * Named screen points. One instance is owned by a recording session and handed
 * by reference to the encoder and to the store that flushes it.
 */
export class LocationTable {
    private points = new Map<string, Point>()
    private counter = 1
    private created = 0
    private modified = false

    constructor(initial: Record<string, Point> = {}) {
        for (const [name, point] of Object.entries(initial)) {
            this.points.set(name, { x: point.x, y: point.y })
        }
    }

    /**
     * Closest location strictly within `threshold` pixels. Equal distances go to
     * the lexically smallest name so the result does not depend on load order.
     */
    findNearest(x: number, y: number, threshold = DEFAULT_MATCH_THRESHOLD): string | undefined {
        let nearest: string | undefined
        let nearestDistance = Number.POSITIVE_INFINITY

        for (const [name, point] of this.points) {
            const d = distance(point, { x, y })
            if (d >= threshold) continue
            if (d < nearestDistance || (d === nearestDistance && nearest !== undefined && name < nearest)) {
                nearest = name
                nearestDistance = d
            }
        }
        return nearest
    }

    /** Stores the point under the next free `click_<n>` name. */
    registerNew(x: number, y: number): string {
        while (this.points.has(`${AUTO_NAME_PREFIX}${this.counter}`)) {
            this.counter++
        }
        const name = `${AUTO_NAME_PREFIX}${this.counter}`
        this.counter++
        this.points.set(name, { x, y })
        this.created++
        this.modified = true
        return name
    }

    resolveOrRegister(x: number, y: number, threshold = DEFAULT_MATCH_THRESHOLD): { name: string; created: boolean } {
        const existing = this.findNearest(x, y, threshold)
        if (existing !== undefined) return { name: existing, created: false }
        return { name: this.registerNew(x, y), created: true }
    }

    get(name: string): Point | undefined {
        const point = this.points.get(name)
        return point ? { ...point } : undefined
    }

    has(name: string): boolean {
        return this.points.has(name)
    }

    set(name: string, point: Point): void {
        this.points.set(name, { x: point.x, y: point.y })
        this.modified = true
    }

    names(): string[] {
        return [...this.points.keys()]
    }

    entries(): Location[] {
        return [...this.points].map(([name, point]) => ({ name, ...point }))
    }

    /** Restarts auto-naming for a new recording session. Stored points are kept. */
    reset(): void {
        this.counter = 1
        this.created = 0
    }

    /** Locations created by `registerNew` since construction or the last `reset`. */
    get createdCount(): number {
        return this.created
    }

    get size(): number {
        return this.points.size
    }

    get dirty(): boolean {
        return this.modified
    }

    markClean(): void {
        this.modified = false
    }

    toJSON(): Record<string, Point> {
        return Object.fromEntries([...this.points].map(([name, point]) => [name, { x: point.x, y: point.y }]))
    }
}
