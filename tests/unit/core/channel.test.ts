import { describe, it, expect } from 'vitest'
import { Channel } from '../../../src/core/channel.js'
import { isAbortError } from '../../../src/core/errors.js'

describe('Channel', () => {
    it('delivers a buffered message', async () => {
        const channel = new Channel<number>()
        expect(channel.send(1)).toBe(true)
        expect(channel.size).toBe(1)
        await expect(channel.receive()).resolves.toBe(1)
        expect(channel.size).toBe(0)
    })

    it('hands a message straight to a waiting receiver', async () => {
        const channel = new Channel<string>(1)
        const received = channel.receive()
        expect(channel.send('go')).toBe(true)
        await expect(received).resolves.toBe('go')
        expect(channel.size).toBe(0)
    })

    it('drops messages when full', () => {
        const channel = new Channel<number>(1)
        expect(channel.send(1)).toBe(true)
        expect(channel.send(2)).toBe(false)
        expect(channel.size).toBe(1)
    })

    it('drain discards buffered messages', async () => {
        const channel = new Channel<number>(4)
        channel.send(1)
        channel.send(2)
        expect(channel.drain()).toBe(2)
        const received = channel.receive()
        channel.send(3)
        await expect(received).resolves.toBe(3)
    })

    it('rejects a second concurrent receiver', async () => {
        const channel = new Channel<number>()
        const first = channel.receive()
        await expect(channel.receive()).rejects.toThrow('already has a receiver')
        channel.send(7)
        await expect(first).resolves.toBe(7)
    })

    it('aborts a pending receive', async () => {
        const channel = new Channel<number>()
        const controller = new AbortController()
        const received = channel.receive(controller.signal)
        controller.abort()
        const error = await received.catch((e: unknown) => e)
        expect(isAbortError(error)).toBe(true)
        // the receiver slot is free again
        const next = channel.receive()
        channel.send(1)
        await expect(next).resolves.toBe(1)
    })

    it('close rejects the waiting receiver and refuses sends', async () => {
        const channel = new Channel<number>()
        const received = channel.receive()
        channel.close()
        await expect(received).rejects.toThrow('Channel closed')
        expect(channel.send(1)).toBe(false)
    })
})
