export interface Word {
    /** The word as written. */
    text: string
    /** Lower-cased form used to match keywords. */
    lower: string
    start: number
    end: number
}

/**
 * Whitespace tokenizer over a single script line. Keywords are consumed one word
 * at a time; free-form arguments (typed text, key combos) are taken with `rest`,
 * which keeps the original spacing and case.
 */
export class LineScanner {
    private pos = 0

    constructor(readonly line: string) {}

    peek(): Word | undefined {
        const match = /\S+/y
        let i = this.pos
        while (i < this.line.length && /\s/.test(this.line.charAt(i))) i++
        match.lastIndex = i
        const found = match.exec(this.line)
        if (!found) return undefined
        return { text: found[0], lower: found[0].toLowerCase(), start: i, end: i + found[0].length }
    }

    next(): Word | undefined {
        const word = this.peek()
        if (word) this.pos = word.end
        return word
    }

    /** Consumes the next word if it equals `keyword` (case-insensitive). */
    accept(keyword: string): boolean {
        const word = this.peek()
        if (word?.lower !== keyword) return false
        this.pos = word.end
        return true
    }

    /** Everything left on the line, trimmed. */
    rest(): string {
        const remaining = this.line.slice(this.pos).trim()
        this.pos = this.line.length
        return remaining
    }

    get done(): boolean {
        return this.peek() === undefined
    }
}

const QUOTES = new Set(['"', "'"])

/** Strips exactly one matching pair of surrounding quotes, if present. */
export function unquote(text: string): string {
    if (text.length >= 2) {
        const first = text.charAt(0)
        if (QUOTES.has(first) && text.charAt(text.length - 1) === first) {
            return text.slice(1, -1)
        }
    }
    return text
}

export function quote(text: string): string {
    return `"${text}"`
}
