import type { TypedTextOptions } from './options.js'
import {
  formatColorHex,
  optional,
  parseColorHex,
  parseDecimal,
  parseInteger,
  parsePercentage,
  parsePercentageInteger,
  parseUnsignedInteger,
  type ColorParseError,
  type NumberParseError,
  type PercentageParseError,
  type RgbaColor,
} from './parsers.js'
import { TypedTextState } from './typed-text-state.js'
import type { Parser } from './types.js'
import {
  acceptAll,
  charsetValidator,
  colorHexValidator,
  numberValidator,
  percentageValidator,
} from './validators.js'

/** Any input is accepted; only the parser decides */
export function withParser<T, E>(
  parser: Parser<T, E>,
  options?: TypedTextOptions<T>
): TypedTextState<T, E> {
  return new TypedTextState(parser, acceptAll, options)
}

/** Only characters in `charset` can be input */
export function withParserFixedCharset<T, E>(
  parser: Parser<T, E>,
  charset: Iterable<string>,
  options?: TypedTextOptions<T>
): TypedTextState<T, E> {
  return new TypedTextState(parser, charsetValidator(charset), options)
}

/** Empty text is a valid "no value"; anything else goes to `parser` */
export function optionalParse<T, E>(
  parser: Parser<T, E>,
  options?: TypedTextOptions<T | undefined>
): TypedTextState<T | undefined, E> {
  return new TypedTextState(optional(parser), acceptAll, {
    format: (value: T | undefined) => (value === undefined ? '' : String(value)),
    ...options,
  })
}

/** Digits and one `.`, with `+` or `-` at the beginning */
export function number(
  options?: TypedTextOptions<number>
): TypedTextState<number, NumberParseError> {
  return new TypedTextState(parseDecimal, numberValidator({ sign: 'any', decimal: true }), options)
}

/** Digits, with `+` or `-` at the beginning */
export function integer(
  options?: TypedTextOptions<number>
): TypedTextState<number, NumberParseError> {
  return new TypedTextState(parseInteger, numberValidator({ sign: 'any', decimal: false }), options)
}

/** Digits, with `+` at the beginning */
export function unsignedInteger(
  options?: TypedTextOptions<number>
): TypedTextState<number, NumberParseError> {
  return new TypedTextState(
    parseUnsignedInteger,
    numberValidator({ sign: 'plus', decimal: false }),
    options
  )
}

/**
 * A hex color starting with `#`.
 * Supports the 3, 4, 6 and 8 digit formats.
 */
export function colorHex(
  options?: TypedTextOptions<RgbaColor>
): TypedTextState<RgbaColor, ColorParseError> {
  return new TypedTextState(parseColorHex, colorHexValidator, {
    format: formatColorHex,
    ...options,
  })
}

/** A decimal percentage in the range 0-100, `+` allowed at the beginning */
export function percentage(
  options?: TypedTextOptions<number>
): TypedTextState<number, PercentageParseError> {
  return new TypedTextState(parsePercentage, percentageValidator({ decimal: true }), options)
}

/** A whole percentage in the range 0-100, `+` allowed at the beginning */
export function percentageInteger(
  options?: TypedTextOptions<number>
): TypedTextState<number, PercentageParseError> {
  return new TypedTextState(
    parsePercentageInteger,
    percentageValidator({ decimal: false }),
    options
  )
}
