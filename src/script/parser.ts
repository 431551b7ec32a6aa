import type { ClickButton, Modifier } from '../core/types.js'
import { normalizeKey, parseModifier } from '../input/keys.js'
import * as cmd from './commands.js'
import { LineScanner, unquote } from './lexer.js'
import { CODE_FENCE, type Command, type ParseDiagnostic, type ParseResult } from './types.js'

const DEFAULT_HOLD_SECONDS = 1
const DEFAULT_WAIT_SECONDS = 1

const POINT_PATTERN = /^\(?\s*(-?\d+)\s*,\s*(-?\d+)\s*\)?$/
const SECONDS_PATTERN = /^(\d+(?:\.\d+)?|\.\d+)\s*s?$/i

/** Outcome of parsing one line: a command, a soft warning, or a rejection. */
type LineOutcome =
    | { command: Command; warning?: string }
    | { error: string }

class LineError extends Error {}

function fail(message: string): never {
    throw new LineError(message)
}

function parseSeconds(text: string): number | undefined {
    const match = SECONDS_PATTERN.exec(text.trim())
    if (!match?.[1]) return undefined
    return Number(match[1])
}

function expectWord(scanner: LineScanner, keyword: string, context: string): void {
    if (!scanner.accept(keyword)) fail(`Expected "${keyword}" in ${context}`)
}

function expectName(text: string, context: string): string {
    if (!text) fail(`Missing location name in ${context}`)
    return text
}

/** Splits `text` around the last standalone `keyword`. Location names may contain spaces. */
function splitAtLast(text: string, keyword: string): [string, string] | undefined {
    const last = [...text.matchAll(new RegExp(`\\s+${keyword}\\s+`, 'gi'))].at(-1)
    if (last?.index === undefined) return undefined
    return [text.slice(0, last.index).trim(), text.slice(last.index + last[0].length).trim()]
}

function expectEnd(scanner: LineScanner, context: string): void {
    const extra = scanner.peek()
    if (extra) fail(`Unexpected "${extra.text}" in ${context}`)
}

function parseMove(scanner: LineScanner): LineOutcome {
    expectWord(scanner, 'mouse', 'move command')
    expectWord(scanner, 'to', 'move command')
    const target = scanner.rest()
    if (!target) fail('Missing target in move command')
    const point = POINT_PATTERN.exec(target)
    if (point?.[1] && point[2]) return { command: cmd.moveToPoint(Number(point[1]), Number(point[2])) }
    return { command: cmd.moveTo(target) }
}

function parseClick(scanner: LineScanner, button: ClickButton): LineOutcome {
    expectWord(scanner, 'click', `${button} click command`)
    const hold = scanner.accept('and')
    if (hold) expectWord(scanner, 'hold', 'click and hold command')
    const context = hold ? 'click and hold command' : 'click command'

    if (!hold) {
        const location = scanner.accept('at') ? expectName(scanner.rest(), context) : undefined
        expectEnd(scanner, context)
        return { command: cmd.click(button, location) }
    }

    let location: string | undefined
    let raw: string | undefined
    if (scanner.accept('at')) {
        const rest = scanner.rest()
        const split = splitAtLast(rest, 'for')
        location = expectName(split ? split[0] : rest, context)
        raw = split?.[1]
    } else if (scanner.accept('for')) {
        raw = scanner.rest()
    } else {
        expectEnd(scanner, context)
    }

    if (raw === undefined) return { command: cmd.clickAndHold(button, DEFAULT_HOLD_SECONDS, location) }
    const duration = parseSeconds(raw)
    if (duration === undefined) {
        return {
            command: cmd.clickAndHold(button, DEFAULT_HOLD_SECONDS, location),
            warning: `Invalid hold duration "${raw}", using ${DEFAULT_HOLD_SECONDS}s`,
        }
    }
    return { command: cmd.clickAndHold(button, duration, location) }
}

function parseDrag(scanner: LineScanner): LineOutcome {
    const button = scanner.next()?.lower
    if (button !== 'left' && button !== 'right') fail('Drag needs "left" or "right"')
    expectWord(scanner, 'from', 'drag command')
    const split = splitAtLast(scanner.rest(), 'to')
    if (!split) fail('Expected "to" in drag command')
    const from = expectName(split[0], 'drag command')
    const to = expectName(split[1], 'drag command')
    return { command: cmd.drag(button, from, to) }
}

function parsePress(scanner: LineScanner): LineOutcome {
    const combo = scanner.rest()
    if (!combo) fail('Missing key in press command')
    const parts = combo.split('+').map((p) => p.trim())
    const key = parts.pop()
    if (!key) fail(`Invalid key combination "${combo}"`)

    const modifiers: Modifier[] = []
    for (const part of parts) {
        const modifier = parseModifier(part)
        if (!modifier) fail(`Unknown modifier "${part}"`)
        modifiers.push(modifier)
    }
    return { command: cmd.press(normalizeKey(key), modifiers) }
}

function parseWait(scanner: LineScanner): LineOutcome {
    const raw = scanner.rest()
    const seconds = parseSeconds(raw)
    if (seconds === undefined) {
        return {
            command: cmd.wait(DEFAULT_WAIT_SECONDS),
            warning: `Invalid wait duration "${raw}", using ${DEFAULT_WAIT_SECONDS}s`,
        }
    }
    return { command: cmd.wait(seconds) }
}

function isCodeBlockStart(line: string): boolean {
    const probe = new LineScanner(line)
    return probe.accept('type') && probe.accept('code') && probe.accept('block')
}

/** Parses a single non-block line. Code blocks span lines and are handled by `parseScript`. */
export function parseLine(source: string): LineOutcome | undefined {
    const line = source.trim()
    if (!line) return undefined
    if (line.startsWith('#')) return { command: cmd.comment(line.slice(1).trim()) }

    const scanner = new LineScanner(line)
    const keyword = scanner.next()
    if (!keyword) return undefined

    const name = keyword.lower
    try {
        switch (name) {
            case 'move':
                return parseMove(scanner)
            case 'left':
            case 'right':
                return parseClick(scanner, name)
            case 'drag':
                return parseDrag(scanner)
            case 'press':
                return parsePress(scanner)
            case 'type':
                if (isCodeBlockStart(line)) return { error: 'Code block outside of a script' }
                if (scanner.accept('line')) return { command: cmd.typeLine(unquote(scanner.rest())) }
                return { command: cmd.type(unquote(scanner.rest())) }
            case 'wait':
            case 'sleep':
                return parseWait(scanner)
            default:
                return { error: `Unknown command "${keyword.text}"` }
        }
    } catch (error) {
        if (error instanceof LineError) return { error: error.message }
        throw error
    }
}

const isFence = (line: string) => line.trim() === CODE_FENCE

/**
 * Parses script text into commands. Never throws on bad input: every rejected
 * line is reported in `diagnostics` and skipped.
 */
export function parseScript(text: string): ParseResult {
    const lines = text.split(/\r?\n/)
    const commands: Command[] = []
    const diagnostics: ParseDiagnostic[] = []

    let i = 0
    while (i < lines.length) {
        const source = lines[i] ?? ''
        const lineNumber = i + 1
        i++

        if (isCodeBlockStart(source)) {
            while (i < lines.length && !isFence(lines[i] ?? '')) {
                const skipped = lines[i] ?? ''
                if (skipped.trim()) {
                    diagnostics.push({ line: i + 1, message: 'Ignored text before code fence', source: skipped })
                }
                i++
            }
            if (i >= lines.length) {
                diagnostics.push({ line: lineNumber, message: 'Code block has no opening fence', source })
                continue
            }
            i++ // opening fence

            const block: string[] = []
            while (i < lines.length && !isFence(lines[i] ?? '')) {
                block.push(lines[i] ?? '')
                i++
            }
            if (i >= lines.length) {
                diagnostics.push({ line: lineNumber, message: 'Code block is not closed', source })
            }
            i++ // closing fence
            commands.push(cmd.typeCodeBlock(block))
            continue
        }

        const outcome = parseLine(source)
        if (!outcome) continue
        if ('error' in outcome) {
            diagnostics.push({ line: lineNumber, message: outcome.error, source })
            continue
        }
        if (outcome.warning) {
            diagnostics.push({ line: lineNumber, message: outcome.warning, source })
        }
        commands.push(outcome.command)
    }

    return { commands, diagnostics }
}
