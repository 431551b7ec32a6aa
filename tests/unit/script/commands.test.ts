import { describe, it, expect } from 'vitest'
import * as cmd from '../../../src/script/commands.js'

describe('command helpers', () => {
    it('press sorts modifiers and drops duplicates', () => {
        expect(cmd.press('s', ['option', 'cmd', 'option'])).toEqual({ kind: 'press', modifiers: ['cmd', 'option'], key: 's' })
    })

    it('commandLocations lists names in argument order', () => {
        expect(cmd.commandLocations(cmd.drag('left', 'from_here', 'to_there'))).toEqual(['from_here', 'to_there'])
        expect(cmd.commandLocations(cmd.moveToPoint(1, 2))).toEqual([])
        expect(cmd.commandLocations(cmd.click('left'))).toEqual([])
        expect(cmd.commandLocations(cmd.clickAndHold('left', 1, 'knob'))).toEqual(['knob'])
    })

    it('referencedLocations keeps first-reference order without repeats', () => {
        const script = [
            cmd.click('left', 'b'),
            cmd.moveTo('a'),
            cmd.drag('left', 'b', 'c'),
            cmd.type('text'),
            cmd.click('right', 'a'),
        ]
        expect(cmd.referencedLocations(script)).toEqual(['b', 'a', 'c'])
    })

    it('countActions ignores comments', () => {
        expect(cmd.countActions([cmd.comment('x'), cmd.wait(1), cmd.press('tab')])).toBe(2)
    })
})
