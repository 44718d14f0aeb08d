import { describe, expect, it } from 'vitest'
import {
  formatColorHex,
  optional,
  parseColorHex,
  parseDecimal,
  parseInteger,
  parsePercentage,
  parsePercentageInteger,
  parseUnsignedInteger,
} from './parsers.js'

describe('parseDecimal', () => {
  it('should parse signed and fractional forms', () => {
    expect(parseDecimal('42')).toEqual({ ok: true, value: 42 })
    expect(parseDecimal('-1.5')).toEqual({ ok: true, value: -1.5 })
    expect(parseDecimal('+.25')).toEqual({ ok: true, value: 0.25 })
    expect(parseDecimal('7.')).toEqual({ ok: true, value: 7 })
  })

  it('should report empty text', () => {
    expect(parseDecimal('')).toEqual({
      ok: false,
      error: { kind: 'empty', message: 'cannot parse a number from empty text' },
    })
  })

  it('should reject partial and foreign input', () => {
    for (const text of ['-', '.', '+.', '1.2.3', '1e5', ' 1', 'abc']) {
      const result = parseDecimal(text)
      expect(result.ok ? undefined : result.error.kind).toBe('invalid-number')
    }
  })

  it('should report numbers that overflow to infinity', () => {
    const result = parseDecimal('9'.repeat(400))
    expect(result.ok ? undefined : result.error.kind).toBe('out-of-range')
  })
})

describe('parseInteger / parseUnsignedInteger', () => {
  it('should parse whole numbers', () => {
    expect(parseInteger('-12')).toEqual({ ok: true, value: -12 })
    expect(parseInteger('+7')).toEqual({ ok: true, value: 7 })
    expect(parseUnsignedInteger('+7')).toEqual({ ok: true, value: 7 })
    expect(parseUnsignedInteger('0042')).toEqual({ ok: true, value: 42 })
  })

  it('should reject fractions and, for unsigned, minus signs', () => {
    const fraction = parseInteger('1.5')
    const negative = parseUnsignedInteger('-3')
    expect(fraction.ok ? undefined : fraction.error.kind).toBe('invalid-number')
    expect(negative.ok ? undefined : negative.error.kind).toBe('invalid-number')
  })

  it('should reject values beyond the safe integer range', () => {
    const result = parseInteger('9007199254740993')
    expect(result.ok ? undefined : result.error.kind).toBe('out-of-range')
  })
})

describe('parseColorHex', () => {
  it('should parse the long forms', () => {
    expect(parseColorHex('#ff8000')).toEqual({ ok: true, value: { r: 255, g: 128, b: 0, a: 255 } })
    expect(parseColorHex('#11223344')).toEqual({
      ok: true,
      value: { r: 17, g: 34, b: 51, a: 68 },
    })
  })

  it('should expand the short forms', () => {
    expect(parseColorHex('#f80')).toEqual({ ok: true, value: { r: 255, g: 136, b: 0, a: 255 } })
    expect(parseColorHex('#0f08')).toEqual({ ok: true, value: { r: 0, g: 255, b: 0, a: 136 } })
  })

  it('should report the first problem it finds', () => {
    const kind = (text: string) => {
      const result = parseColorHex(text)
      return result.ok ? undefined : result.error.kind
    }
    expect(kind('')).toBe('missing-hash')
    expect(kind('ff8000')).toBe('missing-hash')
    expect(kind('#ff8g')).toBe('invalid-digit')
    expect(kind('#ff800')).toBe('invalid-length')
    expect(kind('#gg8000')).toBe('invalid-digit')
  })
})

describe('formatColorHex', () => {
  it('should omit alpha for opaque colors', () => {
    expect(formatColorHex({ r: 255, g: 128, b: 0, a: 255 })).toBe('#ff8000')
    expect(formatColorHex({ r: 1, g: 2, b: 3, a: 4 })).toBe('#01020304')
  })
})

describe('parsePercentage / parsePercentageInteger', () => {
  it('should accept the 0-100 range', () => {
    expect(parsePercentage('0')).toEqual({ ok: true, value: 0 })
    expect(parsePercentage('99.5')).toEqual({ ok: true, value: 99.5 })
    expect(parsePercentageInteger('100')).toEqual({ ok: true, value: 100 })
  })

  it('should report values outside the range', () => {
    expect(parsePercentage('100.1')).toEqual({
      ok: false,
      error: { kind: 'out-of-range-high', message: 'number is more than 100' },
    })
    expect(parsePercentage('-0.5')).toEqual({
      ok: false,
      error: { kind: 'negative', message: 'number is less than 0' },
    })
  })

  it('should pass through number errors', () => {
    const result = parsePercentageInteger('')
    expect(result.ok ? undefined : result.error.kind).toBe('empty')
  })
})

describe('optional', () => {
  it('should parse empty text as undefined', () => {
    const parser = optional(parseInteger)
    expect(parser('')).toEqual({ ok: true, value: undefined })
    expect(parser('5')).toEqual({ ok: true, value: 5 })
    expect(parser('x').ok).toBe(false)
  })
})
