import { z } from 'zod'
import type { Modifier } from '../core/types.js'

const ModifierSchema = z.enum(['cmd', 'ctrl', 'shift', 'option'])

export const ConfigSchema = z.object({
    logLevel: z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace']).optional(),
    recordingsDir: z.string().min(1).optional(),
    matchThreshold: z.number().positive().optional(),
    commandDelay: z.number().min(0).optional(),
    speed: z.number().positive().optional(),
    countdown: z.number().int().min(0).optional(),
    startKey: z.string().min(1).optional(),
    triggerButton: z.enum(['middle', 'right']).optional(),
    pasteModifier: ModifierSchema.optional(),
    releaseModifiersBeforeRisky: z.boolean().optional(),
    riskyCharacters: z.array(z.string().length(1)).optional(),
})

export type Config = z.infer<typeof ConfigSchema>

export interface ResolvedConfig {
    logLevel: 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace'
    recordingsDir: string
    /** Pixels within which a click reuses an existing location. */
    matchThreshold: number
    /** Seconds slept after every played command. */
    commandDelay: number
    speed: number
    countdown: number
    startKey: string
    triggerButton: 'middle' | 'right'
    pasteModifier: Modifier
    releaseModifiersBeforeRisky: boolean
    riskyCharacters: string[]
    projectDir: string
    configDir: string
}
