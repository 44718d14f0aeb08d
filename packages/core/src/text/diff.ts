import type { TextEdit } from '../types.js'
import { spliceChars, toChars } from './chars.js'

/**
 * Recover the single edit that turns `previous` into `next`.
 *
 * Uses the longest common prefix, then the longest common suffix of what is
 * left. Repeated characters make the split ambiguous ("aa" -> "aaa" could be
 * an insertion anywhere), so a UI that knows the caret position passes it as
 * `anchor` and the edit is placed no later than that.
 *
 * @example
 * diffText('abc', 'aXbc')     // { index: 1, deleteCount: 0, inserted: 'X' }
 * diffText('aa', 'aaa', 0)    // { index: 0, deleteCount: 0, inserted: 'a' }
 */
export function diffText(previous: string, next: string, anchor?: number): TextEdit {
  const before = toChars(previous)
  const after = toChars(next)
  const limit = Math.min(before.length, after.length)

  let prefix = 0
  while (prefix < limit && before[prefix] === after[prefix]) {
    prefix++
  }
  if (anchor !== undefined && Number.isFinite(anchor)) {
    prefix = Math.max(0, Math.min(prefix, Math.floor(anchor)))
  }

  let suffix = 0
  while (
    suffix < limit - prefix &&
    before[before.length - 1 - suffix] === after[after.length - 1 - suffix]
  ) {
    suffix++
  }

  return {
    index: prefix,
    deleteCount: before.length - prefix - suffix,
    inserted: after.slice(prefix, after.length - suffix).join(''),
  }
}

export function applyTextEdit(text: string, edit: TextEdit): string {
  return spliceChars(text, edit.index, edit.deleteCount, edit.inserted)
}
