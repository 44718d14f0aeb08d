import { resolveSettings, type TypedTextOptions } from './options.js'
import { ReactiveState } from './reactive-state.js'
import { sameResult } from './result.js'
import { charLength, clampIndex, spliceChars } from './text/chars.js'
import { diffText } from './text/diff.js'
import type {
  DeletionPolicy,
  InputValidator,
  ParseResult,
  Parser,
  SnapshotListener,
  TextEdit,
  TypedTextSnapshot,
} from './types.js'
import { acceptAll } from './validators.js'

function sameSnapshot<T, E>(a: TypedTextSnapshot<T, E>, b: TypedTextSnapshot<T, E>): boolean {
  return a.text === b.text && a.valid === b.valid && sameResult(a.result, b.result)
}

/**
 * Text buffer that only changes through validated edits and keeps a typed
 * value parsed from its contents.
 *
 * A UI binding owns one instance per editable field. On every keystroke it
 * proposes an edit, then reads back `currentText()` for display and
 * `value()` / `lastError()` / `isValid()` for everything else. All calls are
 * synchronous and never throw.
 *
 * @example
 * ```typescript
 * const price = new TypedTextState(parseDecimal, numberValidator({ sign: 'plus', decimal: true }))
 * price.insert('4', 0)    // true
 * price.insert('x', 1)    // false, buffer stays "4"
 * price.value()           // 4
 * ```
 */
export class TypedTextState<T, E> {
  private readonly state: ReactiveState<TypedTextSnapshot<T, E>>
  private readonly initialText: string
  private readonly deletion: DeletionPolicy
  private readonly tag: string
  private readonly debug: boolean
  private readonly format: (value: T) => string
  /** Last successful parse, boxed because T may itself include undefined */
  private lastGood: { value: T } | undefined

  constructor(
    private readonly parser: Parser<T, E>,
    private readonly validator: InputValidator = acceptAll,
    options: TypedTextOptions<T> = {}
  ) {
    const settings = resolveSettings({
      initialText: options.initialText,
      deletion: options.deletion,
      name: options.name,
      debug: options.debug,
    })
    this.initialText = settings.initialText
    this.deletion = settings.deletion
    this.debug = settings.debug
    this.tag = settings.name ? `TypedTextState:${settings.name}` : 'TypedTextState'
    this.format = options.format ?? String

    this.state = new ReactiveState(this.bootstrap(settings.initialText), {
      equals: sameSnapshot,
      name: this.tag,
    })
  }

  // =====================
  // Accessors
  // =====================

  currentText(): string {
    return this.state.get().text
  }

  /**
   * The parsed value of the current text, or undefined while it does not parse.
   * A parser may also succeed with undefined (see optionalParse); use result()
   * or lastError() to tell the two apart.
   */
  value(): T | undefined {
    const result = this.state.get().result
    return result?.ok ? result.value : undefined
  }

  isValid(): boolean {
    return this.state.get().valid
  }

  /** The parser's error for the current text; cleared by a successful parse */
  lastError(): E | undefined {
    const result = this.state.get().result
    return result && !result.ok ? result.error : undefined
  }

  /** Raw result of the most recent parse, undefined if the parser threw */
  result(): ParseResult<T, E> | undefined {
    return this.state.get().result
  }

  /**
   * Most recent successfully parsed value, kept across later parse failures.
   * Unlike value() this may describe an earlier buffer.
   */
  lastGoodValue(): T | undefined {
    return this.lastGood?.value
  }

  snapshot(): TypedTextSnapshot<T, E> {
    return this.state.get()
  }

  /**
   * Listen for committed changes. Listeners run synchronously inside the
   * edit call, after the new state is visible through the accessors.
   */
  subscribe(listener: SnapshotListener<T, E>): () => void {
    return this.state.subscribe(listener)
  }

  // =====================
  // Edits
  // =====================

  /**
   * Propose the whole new buffer, as UI toolkits that report full strings do.
   * The change is recovered by diffing against the current text; `index`
   * is where the edit starts (the caret before a typed character).
   */
  proposeEdit(newText: string, index?: number): boolean {
    return this.applyEdit(diffText(this.currentText(), newText, index))
  }

  insert(inserted: string, index: number): boolean {
    const length = charLength(this.currentText())
    return this.applyEdit({ index: clampIndex(index, length), deleteCount: 0, inserted })
  }

  /** Remove code points `[start, end)` */
  deleteRange(start: number, end: number): boolean {
    return this.replaceRange(start, end, '')
  }

  /** Replace code points `[start, end)` with `inserted` */
  replaceRange(start: number, end: number, inserted: string): boolean {
    const length = charLength(this.currentText())
    const from = clampIndex(Math.min(start, end), length)
    const to = clampIndex(Math.max(start, end), length)
    return this.applyEdit({ index: from, deleteCount: to - from, inserted })
  }

  /** Replace the buffer without consulting the validator */
  setTextUnchecked(text: string): void {
    this.state.set(this.bootstrap(text))
  }

  /** Write a value through `format`; the typed value is re-parsed from that text */
  setValue(value: T): void {
    this.setTextUnchecked(this.format(value))
  }

  /** Back to the initial text */
  reset(): void {
    this.setTextUnchecked(this.initialText)
  }

  // =====================
  // Internals
  // =====================

  private applyEdit(edit: TextEdit): boolean {
    const current = this.currentText()
    const next = spliceChars(current, edit.index, edit.deleteCount, edit.inserted)
    const pureDeletion = edit.inserted === '' && charLength(next) < charLength(current)

    if (!(pureDeletion && this.deletion === 'accept')) {
      // A replacement removes its range first; the validator sees what remains
      const remaining =
        edit.deleteCount > 0 ? spliceChars(current, edit.index, edit.deleteCount, '') : current
      if (!this.runValidator(remaining, edit.inserted, edit.index)) {
        if (this.debug) {
          console.debug(
            `[${this.tag}] Rejected ${JSON.stringify(edit.inserted)} at ${edit.index} into ${JSON.stringify(current)}`
          )
        }
        return false
      }
    }

    const parsed = this.runParser(next)
    if (!parsed.completed) {
      return false
    }

    this.commit({ text: next, valid: true, result: parsed.result })
    return true
  }

  /**
   * Classify text that did not arrive through an edit: parseable text is
   * valid, anything else gets the validator's verdict on a no-op insertion.
   */
  private bootstrap(text: string): TypedTextSnapshot<T, E> {
    const parsed = this.runParser(text)
    const result = parsed.completed ? parsed.result : undefined
    const valid = result?.ok === true || this.runValidator(text, '', 0)
    if (result?.ok) {
      this.lastGood = { value: result.value }
    }
    return { text, valid, result }
  }

  private commit(snapshot: TypedTextSnapshot<T, E>): void {
    if (snapshot.result?.ok) {
      this.lastGood = { value: snapshot.result.value }
    }
    this.state.set(snapshot)
  }

  private runValidator(current: string, inserted: string, index: number): boolean {
    try {
      return this.validator(current, inserted, index)
    } catch (err) {
      console.error(`[${this.tag}] Validator threw, treating as rejection:`, err)
      return false
    }
  }

  private runParser(
    text: string
  ): { completed: true; result: ParseResult<T, E> } | { completed: false } {
    try {
      return { completed: true, result: this.parser(text) }
    } catch (err) {
      console.error(`[${this.tag}] Parser threw on ${JSON.stringify(text)}:`, err)
      return { completed: false }
    }
  }
}
