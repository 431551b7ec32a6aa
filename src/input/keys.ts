import { readFileSync } from 'node:fs'
import { z } from 'zod'
import type { Modifier } from '../core/types.js'

const KeymapSchema = z.object({
    modifiers: z.record(z.enum(['cmd', 'ctrl', 'shift', 'option'])),
    special: z.record(z.string()),
    characters: z.record(z.string().length(1)),
    shifted: z.record(z.string().length(1)),
})

export type Keymap = z.infer<typeof KeymapSchema>

const KEYMAP_URL = new URL('../../data/keymap.json', import.meta.url)

export function loadKeymap(url: URL = KEYMAP_URL): Keymap {
    return KeymapSchema.parse(JSON.parse(readFileSync(url, 'utf8')))
}

const MODIFIER_ALIASES: Record<string, Modifier> = {
    cmd: 'cmd',
    command: 'cmd',
    meta: 'cmd',
    ctrl: 'ctrl',
    control: 'ctrl',
    shift: 'shift',
    option: 'option',
    alt: 'option',
}

const KEY_ALIASES: Record<string, string> = {
    enter: 'return',
    esc: 'escape',
    spacebar: 'space',
}

export function parseModifier(name: string): Modifier | undefined {
    return MODIFIER_ALIASES[name.toLowerCase()]
}

export function normalizeKey(name: string): string {
    const lower = name.toLowerCase()
    return KEY_ALIASES[lower] ?? lower
}

/** How to produce one character: a key name plus whether shift is held. */
export interface Keystroke {
    key: string
    shift: boolean
}

export type DecodedKey =
    | { type: 'modifier'; modifier: Modifier }
    | { type: 'special'; name: string }
    | { type: 'character'; char: string; base: string }

/**
 * Lookup tables between keycodes, key names and characters, built once from
 * the keymap data file.
 */
export class KeyTable {
    private readonly modifiers: Map<number, Modifier>
    private readonly special: Map<number, string>
    private readonly characters: Map<number, string>
    private readonly shifted: Map<string, string>
    private readonly unshifted: Map<string, string>
    private readonly names: Set<string>

    constructor(keymap: Keymap = loadKeymap()) {
        this.modifiers = numericMap(keymap.modifiers)
        this.special = numericMap(keymap.special)
        this.characters = numericMap(keymap.characters)
        this.shifted = new Map(Object.entries(keymap.shifted))
        this.unshifted = new Map(Object.entries(keymap.shifted).map(([base, shifted]) => [shifted, base]))
        this.names = new Set([
            ...this.special.values(),
            ...[...this.characters.values()].filter((c) => c !== ' '),
            ...this.modifiers.values(),
            'space',
        ])
    }

    isModifierKey(keycode: number): boolean {
        return this.modifiers.has(keycode)
    }

    /** Name used in `press` commands for a keycode, ignoring shift. */
    keyName(keycode: number): string | undefined {
        const special = this.special.get(keycode)
        if (special !== undefined) return special
        const char = this.characters.get(keycode)
        if (char === undefined) return undefined
        return char === ' ' ? 'space' : char
    }

    decode(keycode: number, shift: boolean): DecodedKey | undefined {
        const modifier = this.modifiers.get(keycode)
        if (modifier) return { type: 'modifier', modifier }
        const special = this.special.get(keycode)
        if (special !== undefined) return { type: 'special', name: special }
        const base = this.characters.get(keycode)
        if (base === undefined) return undefined
        if (!shift) return { type: 'character', char: base, base }
        if (/^[a-z]$/.test(base)) return { type: 'character', char: base.toUpperCase(), base }
        return { type: 'character', char: this.shifted.get(base) ?? base, base }
    }

    /** Key names a `press` command may use. */
    isKnownKey(name: string): boolean {
        return this.names.has(name)
    }

    /** Keystroke that types `char`, or undefined when no key produces it. */
    keystrokeFor(char: string): Keystroke | undefined {
        if (char === ' ') return { key: 'space', shift: false }
        if (char === '\n') return { key: 'return', shift: false }
        if (char === '\t') return { key: 'tab', shift: false }
        const base = this.unshifted.get(char)
        if (base !== undefined) return { key: base, shift: true }
        if (/^[A-Z]$/.test(char)) return { key: char.toLowerCase(), shift: true }
        if (this.names.has(char)) return { key: char, shift: false }
        return undefined
    }
}

function numericMap<V>(record: Record<string, V>): Map<number, V> {
    return new Map(Object.entries(record).map(([code, value]) => [Number(code), value]))
}
