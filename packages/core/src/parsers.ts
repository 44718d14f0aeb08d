import { err, failure, ok } from './result.js'
import type { ParseFailure, ParseResult, Parser } from './types.js'

export type NumberParseError = ParseFailure<'empty' | 'invalid-number' | 'out-of-range'>

export type ColorParseError = ParseFailure<'missing-hash' | 'invalid-length' | 'invalid-digit'>

export type PercentageParseError = ParseFailure<
  NumberParseError['kind'] | 'out-of-range-high' | 'negative'
>

/** Straight (not premultiplied) 8-bit RGBA */
export interface RgbaColor {
  r: number
  g: number
  b: number
  a: number
}

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/
const INTEGER_PATTERN = /^[+-]?\d+$/
const UNSIGNED_PATTERN = /^\+?\d+$/
const HEX_PATTERN = /^[0-9a-fA-F]+$/

export function parseDecimal(text: string): ParseResult<number, NumberParseError> {
  if (text.length === 0) {
    return err(failure('empty', 'cannot parse a number from empty text'))
  }
  if (!DECIMAL_PATTERN.test(text)) {
    return err(failure('invalid-number', `invalid number: ${JSON.stringify(text)}`))
  }
  const value = Number(text)
  if (!Number.isFinite(value)) {
    return err(failure('out-of-range', `number is too large: ${text}`))
  }
  return ok(value)
}

function parseWholeNumber(
  text: string,
  pattern: RegExp
): ParseResult<number, NumberParseError> {
  if (text.length === 0) {
    return err(failure('empty', 'cannot parse an integer from empty text'))
  }
  if (!pattern.test(text)) {
    return err(failure('invalid-number', `invalid integer: ${JSON.stringify(text)}`))
  }
  const value = Number(text)
  if (!Number.isSafeInteger(value)) {
    return err(failure('out-of-range', `integer is out of the safe range: ${text}`))
  }
  return ok(value)
}

/** Optionally signed whole number within the safe integer range */
export function parseInteger(text: string): ParseResult<number, NumberParseError> {
  return parseWholeNumber(text, INTEGER_PATTERN)
}

/** Whole number with at most a leading `+` */
export function parseUnsignedInteger(text: string): ParseResult<number, NumberParseError> {
  return parseWholeNumber(text, UNSIGNED_PATTERN)
}

/**
 * Parse `#RGB`, `#RGBA`, `#RRGGBB` or `#RRGGBBAA`.
 * Short forms repeat each digit, so `#f80` is `#ff8800`.
 */
export function parseColorHex(text: string): ParseResult<RgbaColor, ColorParseError> {
  if (!text.startsWith('#')) {
    return err(failure('missing-hash', 'color must start with "#"'))
  }
  const hex = text.slice(1)
  if (![3, 4, 6, 8].includes(hex.length)) {
    return err(failure('invalid-length', `expected 3, 4, 6 or 8 hex digits, got ${hex.length}`))
  }
  if (!HEX_PATTERN.test(hex)) {
    return err(failure('invalid-digit', `invalid hex digits: ${JSON.stringify(hex)}`))
  }

  const short = hex.length <= 4
  const width = short ? 1 : 2
  const channels: number[] = []
  for (let i = 0; i < hex.length; i += width) {
    const digits = hex.slice(i, i + width)
    channels.push(parseInt(short ? digits + digits : digits, 16))
  }
  const [r = 0, g = 0, b = 0, a = 255] = channels
  return ok({ r, g, b, a })
}

function toHexByte(channel: number): string {
  return Math.max(0, Math.min(255, Math.round(channel))).toString(16).padStart(2, '0')
}

/** `#rrggbb`, or `#rrggbbaa` when the color is not opaque */
export function formatColorHex(color: RgbaColor): string {
  const rgb = `#${toHexByte(color.r)}${toHexByte(color.g)}${toHexByte(color.b)}`
  return color.a >= 255 ? rgb : rgb + toHexByte(color.a)
}

function checkPercentage(
  result: ParseResult<number, NumberParseError>
): ParseResult<number, PercentageParseError> {
  if (!result.ok) return result
  if (result.value > 100) {
    return err(failure('out-of-range-high', 'number is more than 100'))
  }
  if (result.value < 0) {
    return err(failure('negative', 'number is less than 0'))
  }
  return result
}

/** A decimal percentage in 0-100 */
export function parsePercentage(text: string): ParseResult<number, PercentageParseError> {
  return checkPercentage(parseDecimal(text))
}

/** A whole percentage in 0-100 */
export function parsePercentageInteger(text: string): ParseResult<number, PercentageParseError> {
  return checkPercentage(parseUnsignedInteger(text))
}

/**
 * Lift a parser so that empty text means "no value" instead of an error.
 */
export function optional<T, E>(parser: Parser<T, E>): Parser<T | undefined, E> {
  return (text) => (text.length === 0 ? ok(undefined) : parser(text))
}
