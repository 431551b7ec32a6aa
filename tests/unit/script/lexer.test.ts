import { describe, it, expect } from 'vitest'
import { LineScanner, quote, unquote } from '../../../src/script/lexer.js'

describe('LineScanner', () => {
    it('walks words and keeps their positions', () => {
        const scanner = new LineScanner('  Left   click at Save')
        expect(scanner.next()).toEqual({ text: 'Left', lower: 'left', start: 2, end: 6 })
        expect(scanner.accept('click')).toBe(true)
        expect(scanner.accept('for')).toBe(false)
        expect(scanner.accept('at')).toBe(true)
        expect(scanner.next()?.text).toBe('Save')
        expect(scanner.done).toBe(true)
        expect(scanner.next()).toBeUndefined()
    })

    it('peek does not consume', () => {
        const scanner = new LineScanner('wait 2')
        expect(scanner.peek()?.text).toBe('wait')
        expect(scanner.next()?.text).toBe('wait')
    })

    it('rest returns the remaining text trimmed', () => {
        const scanner = new LineScanner('type   "Hello,  World"  ')
        scanner.next()
        expect(scanner.rest()).toBe('"Hello,  World"')
        expect(scanner.done).toBe(true)
    })
})

describe('unquote', () => {
    it('strips one matching pair of quotes', () => {
        expect(unquote('"hello"')).toBe('hello')
        expect(unquote("'hello'")).toBe('hello')
        expect(unquote('""nested""')).toBe('"nested"')
    })

    it('leaves unmatched or missing quotes alone', () => {
        expect(unquote('"hello\'')).toBe('"hello\'')
        expect(unquote('hello')).toBe('hello')
        expect(unquote('"')).toBe('"')
    })

    it('quote wraps in double quotes', () => {
        expect(quote('hi')).toBe('"hi"')
    })
})
