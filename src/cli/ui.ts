import pc from 'picocolors'
import type { Point } from '../core/types.js'
import type { ParseDiagnostic } from '../script/types.js'

export const VERSION = '0.1.0'

export const colors = {
    brand: (text: string) => pc.magenta(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
    location: (name: string) => pc.cyan(name),
    command: (text: string) => pc.blue(text),
}

export function banner(): string {
    return `${colors.brand('mimic')} ${colors.dim(`v${VERSION}`)} - mouse and keyboard macros`
}

export function formatError(message: string, hint?: string): string {
    const line = `${colors.error('Error:')} ${message}`
    return hint ? `${line}\n${colors.dim(hint)}` : line
}

export function formatPoint(point: Point | undefined): string {
    return point ? `(${point.x}, ${point.y})` : 'unknown'
}

export function formatDiagnostic(diagnostic: ParseDiagnostic): string {
    return `${colors.warn(`line ${diagnostic.line}:`)} ${diagnostic.message} ${colors.dim(`| ${diagnostic.source.trim()}`)}`
}
