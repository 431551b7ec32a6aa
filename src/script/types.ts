import type { ClickButton, Modifier } from '../core/types.js'

export type MoveTarget =
    | { readonly type: 'location'; readonly name: string }
    | { readonly type: 'point'; readonly x: number; readonly y: number }

export type MoveCommand = { readonly kind: 'move'; readonly target: MoveTarget }

export type ClickCommand = {
    readonly kind: 'click'
    readonly button: ClickButton
    readonly location?: string
}

export type ClickAndHoldCommand = {
    readonly kind: 'clickAndHold'
    readonly button: ClickButton
    readonly location?: string
    /** Seconds between button-down and button-up. */
    readonly duration: number
}

export type DragCommand = {
    readonly kind: 'drag'
    readonly button: ClickButton
    readonly from: string
    readonly to: string
}

export type PressCommand = {
    readonly kind: 'press'
    readonly modifiers: readonly Modifier[]
    readonly key: string
}

export type TypeCommand = { readonly kind: 'type'; readonly text: string }
export type TypeLineCommand = { readonly kind: 'typeLine'; readonly text: string }
export type TypeCodeBlockCommand = { readonly kind: 'typeCodeBlock'; readonly lines: readonly string[] }
export type WaitCommand = { readonly kind: 'wait'; readonly seconds: number }
export type CommentCommand = { readonly kind: 'comment'; readonly text: string }

export type Command =
    | MoveCommand
    | ClickCommand
    | ClickAndHoldCommand
    | DragCommand
    | PressCommand
    | TypeCommand
    | TypeLineCommand
    | TypeCodeBlockCommand
    | WaitCommand
    | CommentCommand

export type CommandKind = Command['kind']

export type Script = readonly Command[]

export interface ParseDiagnostic {
    /** 1-based line number in the source text. */
    line: number
    message: string
    source: string
}

export interface ParseResult {
    commands: Command[]
    diagnostics: ParseDiagnostic[]
}

export const CODE_FENCE = '```'
