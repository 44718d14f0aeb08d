/** Outcome of running a parser over a full buffer */
export type ParseResult<T, E> = { ok: true; value: T } | { ok: false; error: E }

/** Turns an accepted buffer into a typed value, or reports why it cannot */
export type Parser<T, E> = (text: string) => ParseResult<T, E>

/**
 * Decides whether `inserted` may be placed at code-point `index` of `currentText`.
 * `currentText` is the buffer before the edit.
 */
export type InputValidator = (currentText: string, inserted: string, index: number) => boolean

/**
 * How pure deletions (nothing inserted) are treated.
 * - `accept`: they bypass the validator; replacements are still validated
 * - `validate`: every edit, pure deletions included, goes through the validator
 */
export type DeletionPolicy = 'accept' | 'validate'

/** A single decomposed edit, in code points */
export interface TextEdit {
  index: number
  deleteCount: number
  inserted: string
}

/** Error value produced by the built-in parsers */
export interface ParseFailure<K extends string> {
  kind: K
  message: string
}

export interface TypedTextSnapshot<T, E> {
  readonly text: string
  readonly valid: boolean
  /** Absent only when the parser threw instead of returning */
  readonly result: ParseResult<T, E> | undefined
}

export type SnapshotListener<T, E> = (
  snapshot: TypedTextSnapshot<T, E>,
  previous: TypedTextSnapshot<T, E>
) => void
