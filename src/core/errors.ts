export type ErrorKind = 'recoverable' | 'fatal'

export class MimicError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'MimicError'
        this.kind = kind
    }
}

/** Skippable problem: the current command is dropped and playback goes on. */
export class RecoverableError extends MimicError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'recoverable', options)
        this.name = 'RecoverableError'
    }
}

/** Setup failure: nothing can run until the user fixes it. */
export class FatalError extends MimicError {
    readonly hint?: string

    constructor(message: string, options?: ErrorOptions & { hint?: string }) {
        super(message, 'fatal', options)
        this.name = 'FatalError'
        this.hint = options?.hint
    }
}

export const ACCESSIBILITY_HINT =
    'Grant accessibility / input monitoring permission to your terminal and try again.'

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function isAbortError(error: unknown): boolean {
    if (error instanceof DOMException && error.name === 'AbortError') return true
    if (error instanceof Error && error.name === 'AbortError') return true
    return false
}

export function abortReason(signal: AbortSignal | undefined): Error {
    const reason: unknown = signal?.reason
    if (reason instanceof Error && isAbortError(reason)) return reason
    const error = new Error('Aborted')
    error.name = 'AbortError'
    return error
}

export function classifyError(error: unknown): ErrorKind {
    if (error instanceof MimicError) return error.kind
    return 'fatal'
}
