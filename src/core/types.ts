export interface Point {
    x: number
    y: number
}

export type MouseButton = 'left' | 'right' | 'middle'

/** Buttons a script can click with. The middle button is reserved for triggers. */
export type ClickButton = Exclude<MouseButton, 'middle'>

export type Modifier = 'cmd' | 'ctrl' | 'shift' | 'option'

/** Canonical press/release order for modifiers. */
export const MODIFIER_ORDER: readonly Modifier[] = ['cmd', 'ctrl', 'shift', 'option']

export function sortModifiers(modifiers: Iterable<Modifier>): Modifier[] {
    const present = new Set(modifiers)
    return MODIFIER_ORDER.filter((m) => present.has(m))
}

export function distance(a: Point, b: Point): number {
    return Math.hypot(a.x - b.x, a.y - b.y)
}
