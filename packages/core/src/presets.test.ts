import { describe, expect, it } from 'vitest'
import {
  colorHex,
  integer,
  number,
  optionalParse,
  percentage,
  percentageInteger,
  unsignedInteger,
  withParser,
  withParserFixedCharset,
} from './presets.js'
import { parseInteger } from './parsers.js'
import { ok } from './result.js'
import type { TypedTextState } from './typed-text-state.js'

/** Type each character at the end of the buffer, keeping only what is accepted */
function typeKeys<T, E>(state: TypedTextState<T, E>, keys: string): string {
  for (const key of keys) {
    state.insert(key, Array.from(state.currentText()).length)
  }
  return state.currentText()
}

describe('presets', () => {
  describe('number', () => {
    it('should drop keystrokes that cannot belong to a number', () => {
      const state = number()

      expect(typeKeys(state, '-1x2.3.4')).toBe('-12.34')
      expect(state.value()).toBe(-12.34)
    })

    it('should stay valid but unparsed on a lone sign', () => {
      const state = number()
      typeKeys(state, '-')

      expect(state.isValid()).toBe(true)
      expect(state.value()).toBeUndefined()
      expect(state.lastError()?.kind).toBe('invalid-number')
    })
  })

  describe('integer / unsignedInteger', () => {
    it('should accept a leading minus only for signed integers', () => {
      const signed = integer()
      const unsigned = unsignedInteger()

      expect(typeKeys(signed, '-42.5')).toBe('-425')
      expect(typeKeys(unsigned, '-42')).toBe('42')
      expect(signed.value()).toBe(-425)
      expect(unsigned.value()).toBe(42)
    })
  })

  describe('colorHex', () => {
    it('should start valid but unparsed with a missing hash', () => {
      const state = colorHex()

      expect(state.isValid()).toBe(true)
      expect(state.value()).toBeUndefined()
      expect(state.lastError()?.kind).toBe('missing-hash')
    })

    it('should parse once enough digits are typed', () => {
      const state = colorHex()

      expect(typeKeys(state, 'ff#0g8')).toBe('#08')
      expect(state.lastError()?.kind).toBe('invalid-length')
      typeKeys(state, 'f')
      expect(state.value()).toEqual({ r: 0, g: 136, b: 255, a: 255 })
    })

    it('should write colors back as hex', () => {
      const state = colorHex()

      state.setValue({ r: 255, g: 0, b: 16, a: 255 })

      expect(state.currentText()).toBe('#ff0010')
      expect(state.value()).toEqual({ r: 255, g: 0, b: 16, a: 255 })
    })
  })

  describe('percentage', () => {
    it('should never hold a value above 100', () => {
      const whole = percentageInteger()
      const decimal = percentage()

      expect(typeKeys(whole, '1005')).toBe('100')
      expect(typeKeys(decimal, '99.95')).toBe('99.95')
      expect(whole.value()).toBe(100)
      expect(decimal.value()).toBe(99.95)
    })

    it('should cap the integer part at three digits', () => {
      const state = percentage()

      expect(typeKeys(state, '250')).toBe('25')
    })
  })

  describe('withParser / withParserFixedCharset / optionalParse', () => {
    it('should leave validation entirely to the parser', () => {
      const state = withParser(parseInteger)

      expect(typeKeys(state, '1a')).toBe('1a')
      expect(state.isValid()).toBe(true)
      expect(state.value()).toBeUndefined()
    })

    it('should limit input to the charset', () => {
      const state = withParserFixedCharset((text) => ok(text.toUpperCase()), 'abc')

      expect(typeKeys(state, 'abxcd')).toBe('abc')
      expect(state.value()).toBe('ABC')
    })

    it('should treat empty text as no value', () => {
      const state = optionalParse(parseInteger)

      expect(state.result()).toEqual({ ok: true, value: undefined })
      typeKeys(state, '12')
      expect(state.value()).toBe(12)
      state.setValue(undefined)
      expect(state.currentText()).toBe('')
    })

    it('should pass options through', () => {
      const state = number({ initialText: '3.5', name: 'price' })

      expect(state.value()).toBe(3.5)
    })
  })

  describe('replacing a selection', () => {
    it('should accept a valid paste over the whole number and refuse garbage', () => {
      const state = number({ initialText: '123' })

      expect(state.replaceRange(0, 3, 'x')).toBe(false)
      expect(state.proposeEdit('ab', 0)).toBe(false)
      expect(state.currentText()).toBe('123')
      expect(state.replaceRange(0, 3, '-4.5')).toBe(true)
      expect(state.value()).toBe(-4.5)
    })

    it('should judge a pasted sign against the text left after the selection', () => {
      const signed = integer({ initialText: '-5' })
      const unsigned = unsignedInteger({ initialText: '12' })

      expect(signed.replaceRange(0, 2, '1.5')).toBe(false)
      expect(signed.replaceRange(0, 2, '+7')).toBe(true)
      expect(signed.value()).toBe(7)
      expect(unsigned.replaceRange(0, 2, '-3')).toBe(false)
      expect(unsigned.replaceRange(0, 2, '34')).toBe(true)
      expect(unsigned.value()).toBe(34)
    })

    it('should replace every digit of a full color', () => {
      const state = colorHex({ initialText: '#ffffff' })

      expect(state.replaceRange(1, 7, 'zz')).toBe(false)
      expect(state.replaceRange(1, 7, '000000')).toBe(true)
      expect(state.value()).toEqual({ r: 0, g: 0, b: 0, a: 255 })
      expect(state.replaceRange(0, 7, '#00ff00')).toBe(true)
      expect(state.value()).toEqual({ r: 0, g: 255, b: 0, a: 255 })
    })

    it('should check a pasted percentage on its own, not next to the old digits', () => {
      const decimal = percentage({ initialText: '50' })
      const whole = percentageInteger({ initialText: '50' })

      expect(decimal.replaceRange(0, 2, '150')).toBe(false)
      expect(decimal.replaceRange(0, 2, '100')).toBe(true)
      expect(decimal.value()).toBe(100)
      expect(whole.replaceRange(0, 2, '7.5')).toBe(false)
      expect(whole.replaceRange(0, 2, '75')).toBe(true)
      expect(whole.value()).toBe(75)
    })

    it('should accept a whole-string update that swaps part of the text', () => {
      const state = percentage({ initialText: '50' })

      expect(state.proposeEdit('100', 0)).toBe(true)
      expect(state.currentText()).toBe('100')
    })

    it('should still limit a pasted selection to the charset', () => {
      const state = withParserFixedCharset((text) => ok(text), 'abc', { initialText: 'abc' })

      expect(state.replaceRange(0, 3, 'z')).toBe(false)
      expect(state.replaceRange(0, 3, 'cab')).toBe(true)
      expect(state.currentText()).toBe('cab')
    })
  })
})
