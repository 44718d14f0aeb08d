import type { ParseFailure, ParseResult } from './types.js'

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value }
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error }
}

export function failure<K extends string>(kind: K, message: string): ParseFailure<K> {
  return { kind, message }
}

/**
 * Shallow equality of two parse results: same branch and the same value or error by `Object.is`.
 */
export function sameResult<T, E>(
  a: ParseResult<T, E> | undefined,
  b: ParseResult<T, E> | undefined
): boolean {
  if (a === b) return true
  if (!a || !b) return false
  if (a.ok && b.ok) return Object.is(a.value, b.value)
  if (!a.ok && !b.ok) return Object.is(a.error, b.error)
  return false
}
