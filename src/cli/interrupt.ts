export interface Interrupt {
    signal: AbortSignal
    dispose(): void
}

/** Abort signal fired by the first Ctrl-C. */
export function onInterrupt(): Interrupt {
    const controller = new AbortController()
    const onSigint = () => controller.abort()
    process.once('SIGINT', onSigint)
    return {
        signal: controller.signal,
        dispose: () => {
            process.off('SIGINT', onSigint)
        },
    }
}
