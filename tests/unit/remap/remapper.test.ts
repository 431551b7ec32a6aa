import { describe, it, expect, vi } from 'vitest'
import { TypedEventEmitter } from '../../../src/core/events.js'
import { isAbortError } from '../../../src/core/errors.js'
import { LocationTable } from '../../../src/locations/table.js'
import { Remapper } from '../../../src/remap/remapper.js'
import * as cmd from '../../../src/script/commands.js'
import type { Script } from '../../../src/script/types.js'
import { FakeInputSource, FakeSynthesizer, mouseDown, silentLogger } from '../../helpers/fakes.js'

const script: Script = [
    cmd.click('left', 'b'),
    cmd.moveTo('a'),
    cmd.drag('left', 'b', 'a'),
    cmd.click('left', 'ghost'),
]

const oldTable = () =>
    new LocationTable({
        a: { x: 10, y: 10 },
        b: { x: 20, y: 20 },
        unused: { x: 99, y: 99 },
    })

/** Answers each `remap:target` with the next scripted input event. */
function answerWith(bus: TypedEventEmitter, answers: Array<() => void>) {
    const targets: string[] = []
    bus.on('remap:target', ({ name }) => {
        targets.push(name)
        const answer = answers.shift()
        // the remapper awaits the cursor move before listening
        if (answer) setTimeout(answer, 0)
    })
    return targets
}

function setup() {
    const bus = new TypedEventEmitter()
    const source = new FakeInputSource()
    const synthesizer = new FakeSynthesizer()
    const remapper = new Remapper({ logger: silentLogger, synthesizer, eventBus: bus })
    source.subscribe(remapper.listener)
    return { bus, source, synthesizer, remapper }
}

describe('Remapper', () => {
    it('visits each referenced name once and copies unreferenced ones', async () => {
        const { bus, source, synthesizer, remapper } = setup()
        const targets = answerWith(bus, [
            () => source.emit(mouseDown('left', 200, 210, 1)),
            () => source.emit(mouseDown('middle', 0, 0, 2)),
            () => source.emit(mouseDown('middle', 0, 0, 3)),
        ])

        const table = await remapper.remap(script, oldTable())

        expect(targets).toEqual(['b', 'a', 'ghost'])
        expect(table.toJSON()).toEqual({
            b: { x: 200, y: 210 },
            a: { x: 10, y: 10 },
            unused: { x: 99, y: 99 },
        })
        expect(table.has('ghost')).toBe(false)
        expect(synthesizer.moves()).toEqual([
            { x: 20, y: 20 },
            { x: 10, y: 10 },
        ])
    })

    it('emits resolution events', async () => {
        const { bus, source, remapper } = setup()
        const resolved = vi.fn()
        bus.on('remap:resolved', resolved)
        answerWith(bus, [
            () => source.emit(mouseDown('left', 5, 6, 1)),
            () => source.emit(mouseDown('middle', 0, 0, 2)),
            () => source.emit(mouseDown('middle', 0, 0, 3)),
        ])

        await remapper.remap(script, oldTable())

        expect(resolved.mock.calls.map(([data]) => data)).toEqual([
            { name: 'b', point: { x: 5, y: 6 }, kept: false },
            { name: 'a', point: { x: 10, y: 10 }, kept: true },
            { name: 'ghost', point: undefined, kept: true },
        ])
    })

    it('drops confirmations that arrive before a target is pending', async () => {
        const { bus, source, remapper } = setup()
        // stray click while nothing is asked
        source.emit(mouseDown('left', 1, 1, 0))
        answerWith(bus, [() => source.emit(mouseDown('left', 7, 7, 1))])

        const table = await remapper.remap([cmd.click('left', 'a')], oldTable())
        expect(table.get('a')).toEqual({ x: 7, y: 7 })
    })

    it('ignores right clicks and other input', async () => {
        const { bus, source, remapper } = setup()
        answerWith(bus, [
            () => {
                source.emit(mouseDown('right', 50, 50, 1))
                setTimeout(() => source.emit(mouseDown('left', 8, 9, 2)), 0)
            },
        ])

        const table = await remapper.remap([cmd.moveTo('a')], oldTable())
        expect(table.get('a')).toEqual({ x: 8, y: 9 })
    })

    it('leaves the input script untouched and returns a dirty table', async () => {
        const { bus, source, remapper } = setup()
        const before = JSON.stringify(script)
        answerWith(bus, [
            () => source.emit(mouseDown('middle', 0, 0, 1)),
            () => source.emit(mouseDown('middle', 0, 0, 2)),
            () => source.emit(mouseDown('middle', 0, 0, 3)),
        ])
        const table = await remapper.remap(script, oldTable())
        expect(JSON.stringify(script)).toBe(before)
        expect(table.dirty).toBe(true)
    })

    it('is cancellable while waiting for a confirmation', async () => {
        const { remapper } = setup()
        const controller = new AbortController()
        const pending = remapper.remap(script, oldTable(), controller.signal)
        setTimeout(() => controller.abort(), 0)
        const error = await pending.catch((e: unknown) => e)
        expect(isAbortError(error)).toBe(true)
    })

    it('accepts confirmations sent directly', async () => {
        const remapper = new Remapper({ logger: silentLogger })
        const pending = remapper.remap([cmd.moveTo('a')], oldTable())
        await new Promise((resolve) => setTimeout(resolve, 0))
        expect(remapper.confirm({ type: 'adopt', point: { x: 3, y: 4 } })).toBe(true)
        expect((await pending).get('a')).toEqual({ x: 3, y: 4 })
    })
})
