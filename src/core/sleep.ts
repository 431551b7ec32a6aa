import { abortReason } from './errors.js'

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>

export const sleep: Sleeper = (ms, signal) => {
    if (signal?.aborted) return Promise.reject(abortReason(signal))
    return new Promise((resolve, reject) => {
        const onAbort = () => {
            clearTimeout(timer)
            reject(abortReason(signal))
        }
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort)
            resolve()
        }, Math.max(0, ms))
        signal?.addEventListener('abort', onAbort, { once: true })
    })
}
