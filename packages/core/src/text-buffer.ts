import { charLength } from './text/chars.js'
import type { TypedTextState } from './typed-text-state.js'

/**
 * The editing surface a text widget needs from its model: read the string,
 * insert at a character index, delete a character range.
 */
export interface TextBuffer {
  isMutable(): boolean
  asString(): string
  /** @returns how many characters were actually inserted */
  insertText(text: string, charIndex: number): number
  deleteCharRange(start: number, end: number): void
}

/**
 * Adapts a TypedTextState to the {@link TextBuffer} shape widgets edit
 * through, so a binding can hand it to a text field directly.
 */
export class TypedTextBuffer<T, E> implements TextBuffer {
  constructor(readonly state: TypedTextState<T, E>) {}

  isMutable(): boolean {
    return true
  }

  asString(): string {
    return this.state.currentText()
  }

  charCount(): number {
    return charLength(this.state.currentText())
  }

  insertText(text: string, charIndex: number): number {
    return this.state.insert(text, charIndex) ? charLength(text) : 0
  }

  deleteCharRange(start: number, end: number): void {
    this.state.deleteRange(start, end)
  }

  /** For widgets that report the whole new string instead of an edit */
  replaceWith(newText: string, caret?: number): boolean {
    return this.state.proposeEdit(newText, caret)
  }

  clear(): void {
    this.state.setTextUnchecked('')
  }
}
