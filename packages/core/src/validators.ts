import { charLength, spliceChars, toChars } from './text/chars.js'
import type { InputValidator } from './types.js'

const SIGN_PATTERN = /^[+-]/
const DIGIT_PATTERN = /^\d$/
const HEX_DIGITS_PATTERN = /^[0-9a-fA-F]*$/

/** Accepts every insertion */
export const acceptAll: InputValidator = () => true

/** Only characters from `charset` may be inserted */
export function charsetValidator(charset: Iterable<string>): InputValidator {
  const allowed = new Set<string>()
  for (const entry of charset) {
    for (const char of entry) allowed.add(char)
  }
  return (_current, inserted) => toChars(inserted).every((char) => allowed.has(char))
}

export interface NumberValidatorOptions {
  /**
   * Which leading sign may be typed at index 0.
   * - `any`: `+` or `-`
   * - `plus`: only `+`
   * - `none`: no sign
   */
  sign: 'any' | 'plus' | 'none'
  /** Allow a single `.` anywhere in the buffer */
  decimal: boolean
}

/**
 * Digits, an optional leading sign and (for decimals) one dot.
 *
 * Nothing may be typed in front of an existing sign, and a second sign is
 * never accepted. Empty insertions are always fine.
 */
export function numberValidator(options: NumberValidatorOptions): InputValidator {
  return (current, inserted, index) => {
    let body = inserted
    if (index === 0 && SIGN_PATTERN.test(inserted)) {
      const sign = inserted.charAt(0)
      if (options.sign === 'none' || (options.sign === 'plus' && sign !== '+')) return false
      if (SIGN_PATTERN.test(current)) return false
      body = inserted.slice(1)
    } else if (index === 0 && inserted.length > 0 && SIGN_PATTERN.test(current)) {
      return false
    }

    let dots = current.includes('.') ? 1 : 0
    for (const char of body) {
      if (DIGIT_PATTERN.test(char)) continue
      if (char === '.' && options.decimal && dots === 0) {
        dots++
        continue
      }
      return false
    }
    return true
  }
}

/** Longest hex color text, `#RRGGBBAA` */
const MAX_COLOR_LENGTH = 9

/**
 * `#` at the very start, hex digits everywhere else.
 */
export const colorHexValidator: InputValidator = (current, inserted, index) => {
  if (inserted.length === 0) return true
  if (charLength(current) + charLength(inserted) > MAX_COLOR_LENGTH) return false
  if (index === 0) {
    return (
      inserted.startsWith('#') &&
      !current.startsWith('#') &&
      HEX_DIGITS_PATTERN.test(inserted.slice(1))
    )
  }
  return HEX_DIGITS_PATTERN.test(inserted)
}

const PERCENTAGE_DECIMAL_PATTERN = /^\+?\d{0,3}(\.\d*)?$/
const PERCENTAGE_INTEGER_PATTERN = /^\+?\d{0,3}$/

/**
 * Keeps the buffer a prefix of a number in 0-100: an optional `+`, up to
 * three integer digits and, for decimals, a fraction. "100" can only be
 * followed by zeros.
 */
export function percentageValidator(options: { decimal: boolean }): InputValidator {
  const pattern = options.decimal ? PERCENTAGE_DECIMAL_PATTERN : PERCENTAGE_INTEGER_PATTERN
  return (current, inserted, index) => {
    const candidate = spliceChars(current, index, 0, inserted)
    if (!pattern.test(candidate)) return false
    const digits = candidate.replace(/^\+/, '')
    if (!/\d/.test(digits)) return true
    return Number(digits) <= 100
  }
}
