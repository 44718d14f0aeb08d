/**
 * Code-point text helpers.
 *
 * Every index in typedtext counts Unicode scalar values, so a surrogate pair
 * such as an emoji occupies one position, the same as any other character.
 */

export function toChars(text: string): string[] {
  return Array.from(text)
}

export function charLength(text: string): number {
  return toChars(text).length
}

/** Clamps `index` into `[0, length]` */
export function clampIndex(index: number, length: number): number {
  if (Number.isNaN(index) || index <= 0) return 0
  return Math.min(Math.floor(index), length)
}

export function sliceChars(text: string, start: number, end?: number): string {
  return toChars(text).slice(start, end).join('')
}

export function spliceChars(
  text: string,
  index: number,
  deleteCount: number,
  inserted: string
): string {
  const chars = toChars(text)
  const start = clampIndex(index, chars.length)
  const removed = Math.max(0, Math.min(deleteCount, chars.length - start))
  return chars.slice(0, start).join('') + inserted + chars.slice(start + removed).join('')
}
