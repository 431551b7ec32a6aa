import { abortReason } from '../core/errors.js'
import { type Sleeper, sleep } from '../core/sleep.js'
import type { KeyTable } from '../input/keys.js'
import type { InputSource } from '../input/types.js'

/** Calls `onTick` with the seconds left, once per second, then resolves. */
export async function countdown(
    seconds: number,
    onTick: (remaining: number) => void,
    signal?: AbortSignal,
    sleeper: Sleeper = sleep
): Promise<void> {
    for (let remaining = seconds; remaining > 0; remaining--) {
        onTick(remaining)
        await sleeper(1000, signal)
    }
}

/**
 * Resolves on the first key-down of `key` seen by the source. The source must
 * already be started.
 */
export function waitForStartKey(source: InputSource, keys: KeyTable, key: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(abortReason(signal))
    return new Promise((resolve, reject) => {
        const onAbort = () => {
            unsubscribe()
            reject(abortReason(signal))
        }
        const unsubscribe = source.subscribe((event) => {
            if (event.type !== 'keyDown' || keys.keyName(event.keycode) !== key) return
            unsubscribe()
            signal?.removeEventListener('abort', onAbort)
            resolve()
        })
        signal?.addEventListener('abort', onAbort, { once: true })
    })
}
