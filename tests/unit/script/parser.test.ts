import { describe, it, expect } from 'vitest'
import * as cmd from '../../../src/script/commands.js'
import { parseLine, parseScript } from '../../../src/script/parser.js'

function commandOf(line: string) {
    const outcome = parseLine(line)
    if (!outcome || 'error' in outcome) throw new Error(`expected a command for ${line}`)
    return outcome.command
}

describe('parseLine', () => {
    it('parses moves to names and points', () => {
        expect(commandOf('move mouse to Save_Button')).toEqual(cmd.moveTo('Save_Button'))
        expect(commandOf('move mouse to (120, 45)')).toEqual(cmd.moveToPoint(120, 45))
        expect(commandOf('MOVE MOUSE TO 3,4')).toEqual(cmd.moveToPoint(3, 4))
    })

    it('parses clicks', () => {
        expect(commandOf('left click')).toEqual(cmd.click('left'))
        expect(commandOf('right click at menu')).toEqual(cmd.click('right', 'menu'))
        expect(commandOf('Left Click At Menu')).toEqual(cmd.click('left', 'Menu'))
    })

    it('parses click and hold with and without a duration', () => {
        expect(commandOf('left click and hold at slider for 2.5s')).toEqual(cmd.clickAndHold('left', 2.5, 'slider'))
        expect(commandOf('left click and hold for 0.8')).toEqual(cmd.clickAndHold('left', 0.8))
        expect(commandOf('right click and hold at knob')).toEqual(cmd.clickAndHold('right', 1, 'knob'))
    })

    it('defaults a bad hold duration with a warning', () => {
        expect(parseLine('left click and hold at knob for ever')).toEqual({
            command: cmd.clickAndHold('left', 1, 'knob'),
            warning: 'Invalid hold duration "ever", using 1s',
        })
    })

    it('reads location names with spaces', () => {
        expect(commandOf('move mouse to save button')).toEqual(cmd.moveTo('save button'))
        expect(commandOf('left click at save button')).toEqual(cmd.click('left', 'save button'))
        expect(commandOf('left click and hold at big slider for 2s')).toEqual(
            cmd.clickAndHold('left', 2, 'big slider')
        )
        expect(commandOf('drag left from file list to trash can')).toEqual(cmd.drag('left', 'file list', 'trash can'))
        expect(parseLine('left click at')).toEqual({ error: 'Missing location name in click command' })
    })

    it('parses drags', () => {
        expect(commandOf('drag left from a to b')).toEqual(cmd.drag('left', 'a', 'b'))
        expect(parseLine('drag middle from a to b')).toEqual({ error: 'Drag needs "left" or "right"' })
        expect(parseLine('drag left from a')).toEqual({ error: 'Expected "to" in drag command' })
    })

    it('parses key presses with modifiers in canonical order', () => {
        expect(commandOf('press cmd+s')).toEqual(cmd.press('s', ['cmd']))
        expect(commandOf('press shift+cmd+Z')).toEqual({ kind: 'press', modifiers: ['cmd', 'shift'], key: 'z' })
        expect(commandOf('press return')).toEqual(cmd.press('return'))
    })

    it('accepts modifier and key aliases', () => {
        expect(commandOf('press command+control+alt+enter')).toEqual({
            kind: 'press',
            modifiers: ['cmd', 'ctrl', 'option'],
            key: 'return',
        })
        expect(commandOf('press esc')).toEqual(cmd.press('escape'))
    })

    it('rejects unknown modifiers', () => {
        expect(parseLine('press hyper+k')).toEqual({ error: 'Unknown modifier "hyper"' })
    })

    it('parses typed text with either quote style', () => {
        expect(commandOf('type "Hello"')).toEqual(cmd.type('Hello'))
        expect(commandOf("type 'it is'")).toEqual(cmd.type('it is'))
        expect(commandOf('type plain words')).toEqual(cmd.type('plain words'))
        expect(commandOf('type line "ls -la"')).toEqual(cmd.typeLine('ls -la'))
    })

    it('parses waits and sleeps', () => {
        expect(commandOf('wait 0.25')).toEqual(cmd.wait(0.25))
        expect(commandOf('sleep 2s')).toEqual(cmd.wait(2))
        expect(parseLine('wait a bit')).toEqual({
            command: cmd.wait(1),
            warning: 'Invalid wait duration "a bit", using 1s',
        })
    })

    it('parses comments and skips blank lines', () => {
        expect(commandOf('#  open the menu ')).toEqual(cmd.comment('open the menu'))
        expect(parseLine('   ')).toBeUndefined()
    })

    it('reports unknown commands', () => {
        expect(parseLine('jump over')).toEqual({ error: 'Unknown command "jump"' })
    })
})

describe('parseScript', () => {
    it('parses a script and collects diagnostics with line numbers', () => {
        const result = parseScript(['left click at a', 'fly away', '', 'wait 1'].join('\n'))
        expect(result.commands).toEqual([cmd.click('left', 'a'), cmd.wait(1)])
        expect(result.diagnostics).toEqual([{ line: 2, message: 'Unknown command "fly"', source: 'fly away' }])
    })

    it('collects code blocks verbatim', () => {
        const text = ['type code block', '```', 'def main():', '    return 1', '', '```', 'press return'].join('\n')
        const result = parseScript(text)
        expect(result.commands).toEqual([
            cmd.typeCodeBlock(['def main():', '    return 1', '']),
            cmd.press('return'),
        ])
        expect(result.diagnostics).toEqual([])
    })

    it('accepts a fence with surrounding whitespace', () => {
        const result = parseScript(['type code block', '  ```  ', 'x = 1', '```'].join('\n'))
        expect(result.commands).toEqual([cmd.typeCodeBlock(['x = 1'])])
    })

    it('reports an unterminated code block and keeps its lines', () => {
        const result = parseScript(['type code block', '```', 'a', 'b'].join('\n'))
        expect(result.commands).toEqual([cmd.typeCodeBlock(['a', 'b'])])
        expect(result.diagnostics).toEqual([{ line: 1, message: 'Code block is not closed', source: 'type code block' }])
    })

    it('reports a code block without an opening fence', () => {
        const result = parseScript(['type code block', 'oops'].join('\n'))
        expect(result.commands).toEqual([])
        expect(result.diagnostics).toEqual([
            { line: 2, message: 'Ignored text before code fence', source: 'oops' },
            { line: 1, message: 'Code block has no opening fence', source: 'type code block' },
        ])
    })

    it('handles CRLF line endings', () => {
        expect(parseScript('wait 1\r\npress tab\r\n').commands).toEqual([cmd.wait(1), cmd.press('tab')])
    })
})
