/**
 * @typedtext/core
 *
 * Typed, incrementally validated text buffers. A TypedTextState accepts or
 * rejects each edit through an input validator and keeps a typed value
 * parsed from whatever text it holds, ready for a UI binding to read on
 * every frame.
 *
 * @packageDocumentation
 */

// Edit-validate-parse state machine
export { TypedTextState } from './typed-text-state.js'

// Core types
export type {
  DeletionPolicy,
  InputValidator,
  ParseFailure,
  ParseResult,
  Parser,
  SnapshotListener,
  TextEdit,
  TypedTextSnapshot,
} from './types.js'

// Settings
export {
  TypedTextSettingsSchema,
  DEFAULT_SETTINGS,
  resolveSettings,
  type TypedTextOptions,
  type TypedTextSettings,
  type TypedTextSettingsInput,
} from './options.js'

// Result helpers
export { ok, err, failure, sameResult } from './result.js'

// Built-in parsers
export {
  parseDecimal,
  parseInteger,
  parseUnsignedInteger,
  parseColorHex,
  formatColorHex,
  parsePercentage,
  parsePercentageInteger,
  optional,
  type NumberParseError,
  type ColorParseError,
  type PercentageParseError,
  type RgbaColor,
} from './parsers.js'

// Built-in validators
export {
  acceptAll,
  charsetValidator,
  numberValidator,
  colorHexValidator,
  percentageValidator,
  type NumberValidatorOptions,
} from './validators.js'

// Ready-made states
export {
  withParser,
  withParserFixedCharset,
  optionalParse,
  number,
  integer,
  unsignedInteger,
  colorHex,
  percentage,
  percentageInteger,
} from './presets.js'

// Code-point text helpers and diffing
export { charLength, clampIndex, sliceChars, spliceChars, toChars } from './text/chars.js'
export { applyTextEdit, diffText } from './text/diff.js'

// Widget-facing buffer
export { TypedTextBuffer, type TextBuffer } from './text-buffer.js'

// Observable cell
export { ReactiveState, type ReactiveStateOptions, type StateListener } from './reactive-state.js'
