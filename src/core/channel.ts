import { abortReason } from './errors.js'

interface Waiter<T> {
    resolve: (value: T) => void
    reject: (reason: unknown) => void
}

/**
 * Bounded single-producer/single-consumer mailbox.
 *
 * The producer side never blocks: `send` returns false when the buffer is full
 * and the message is dropped. The consumer awaits `receive`.
 */
export class Channel<T> {
    private buffer: T[] = []
    private waiter: Waiter<T> | null = null
    private closed = false

    constructor(private capacity = 16) {}

    send(message: T): boolean {
        if (this.closed) return false
        if (this.waiter) {
            const { resolve } = this.waiter
            this.waiter = null
            resolve(message)
            return true
        }
        if (this.buffer.length >= this.capacity) return false
        this.buffer.push(message)
        return true
    }

    receive(signal?: AbortSignal): Promise<T> {
        const next = this.buffer.shift()
        if (next !== undefined) return Promise.resolve(next)
        if (this.closed) return Promise.reject(new Error('Channel closed'))
        if (this.waiter) return Promise.reject(new Error('Channel already has a receiver'))
        if (signal?.aborted) return Promise.reject(abortReason(signal))

        return new Promise<T>((resolve, reject) => {
            const onAbort = () => {
                this.waiter = null
                reject(abortReason(signal))
            }
            signal?.addEventListener('abort', onAbort, { once: true })
            this.waiter = {
                resolve: (value) => {
                    signal?.removeEventListener('abort', onAbort)
                    resolve(value)
                },
                reject: (reason) => {
                    signal?.removeEventListener('abort', onAbort)
                    reject(reason)
                },
            }
        })
    }

    /** Discards buffered messages and returns how many were dropped. */
    drain(): number {
        const dropped = this.buffer.length
        this.buffer = []
        return dropped
    }

    close(): void {
        this.closed = true
        this.buffer = []
        if (this.waiter) {
            const { reject } = this.waiter
            this.waiter = null
            reject(new Error('Channel closed'))
        }
    }

    get size(): number {
        return this.buffer.length
    }
}
