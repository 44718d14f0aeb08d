import { readFile } from 'node:fs/promises'
import {
  charLength,
  colorHex,
  integer,
  number,
  percentage,
  percentageInteger,
  unsignedInteger,
  withParser,
  ok,
  type ParseResult,
} from '@typedtext/core'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'

export const PRESET_NAMES = [
  'number',
  'integer',
  'unsigned',
  'color-hex',
  'percentage',
  'percentage-integer',
  'text',
] as const

export type PresetName = (typeof PRESET_NAMES)[number]

/**
 * The slice of TypedTextState the replayer drives, with the value and error
 * types erased so every preset fits one shape.
 */
export interface ReplayTarget {
  currentText(): string
  isValid(): boolean
  result(): ParseResult<unknown, { message: string }> | undefined
  insert(inserted: string, index: number): boolean
  deleteRange(start: number, end: number): boolean
  proposeEdit(newText: string, index?: number): boolean
  setTextUnchecked(text: string): void
}

export interface PresetOptions {
  initialText?: string
  name?: string
  debug?: boolean
}

export function createPresetState(preset: PresetName, options: PresetOptions = {}): ReplayTarget {
  switch (preset) {
    case 'number':
      return number(options)
    case 'integer':
      return integer(options)
    case 'unsigned':
      return unsignedInteger(options)
    case 'color-hex':
      return colorHex(options)
    case 'percentage':
      return percentage(options)
    case 'percentage-integer':
      return percentageInteger(options)
    case 'text':
      return withParser<string, never>((text) => ok(text), options)
  }
}

// =====================
// Script schema
// =====================

const IndexSchema = z.number().int().nonnegative()

export const ReplayActionSchema = z.union([
  z.enum(['backspace', 'clear']),
  z.object({ type: z.string() }).strict(),
  z.object({ insert: z.string(), at: IndexSchema }).strict(),
  z.object({ delete: z.tuple([IndexSchema, IndexSchema]) }).strict(),
  z.object({ set: z.string() }).strict(),
  z.object({ propose: z.string(), at: IndexSchema.optional() }).strict(),
])

export type ReplayAction = z.infer<typeof ReplayActionSchema>

export const ReplayScriptSchema = z.object({
  preset: z.enum(PRESET_NAMES),
  initialText: z.string().optional(),
  name: z.string().min(1).optional(),
  steps: z.array(ReplayActionSchema).default([]),
})

export type ReplayScript = z.infer<typeof ReplayScriptSchema>

export class ReplayScriptError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ReplayScriptError'
  }
}

export function parseReplayScript(content: string, origin = '<inline>'): ReplayScript {
  let raw: unknown
  try {
    raw = parseYaml(content)
  } catch (err) {
    throw new ReplayScriptError(
      `Invalid YAML in ${origin}: ${err instanceof Error ? err.message : String(err)}`
    )
  }

  const parsed = ReplayScriptSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ReplayScriptError(`Invalid replay script ${origin}: ${parsed.error.message}`)
  }
  return parsed.data
}

export async function loadReplayScript(path: string): Promise<ReplayScript> {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (err) {
    throw new ReplayScriptError(
      `Cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`
    )
  }
  return parseReplayScript(content, path)
}

/** Command-line keys: `<bs>` is a backspace, `<clear>` empties the buffer, anything else is typed */
export function keysToActions(keys: readonly string[]): ReplayAction[] {
  return keys.map((key): ReplayAction => {
    if (key === '<bs>') return 'backspace'
    if (key === '<clear>') return 'clear'
    return { type: key }
  })
}

// =====================
// Replay
// =====================

export interface ReplayStep {
  action: string
  accepted: boolean
  text: string
  valid: boolean
  /** Present only when the text parsed */
  value?: unknown
  /** Parser message when the text did not parse */
  error?: string
}

function apply(target: ReplayTarget, action: ReplayAction): { label: string; accepted: boolean } {
  const end = charLength(target.currentText())

  if (action === 'backspace') {
    // Nothing to delete at the start of an empty buffer
    if (end === 0) return { label: 'backspace', accepted: false }
    return { label: 'backspace', accepted: target.deleteRange(end - 1, end) }
  }
  if (action === 'clear') {
    target.setTextUnchecked('')
    return { label: 'clear', accepted: true }
  }
  if ('type' in action) {
    return {
      label: `type ${JSON.stringify(action.type)}`,
      accepted: target.insert(action.type, end),
    }
  }
  if ('insert' in action) {
    return {
      label: `insert ${JSON.stringify(action.insert)} at ${action.at}`,
      accepted: target.insert(action.insert, action.at),
    }
  }
  if ('delete' in action) {
    const [start, stop] = action.delete
    return { label: `delete ${start}..${stop}`, accepted: target.deleteRange(start, stop) }
  }
  if ('set' in action) {
    target.setTextUnchecked(action.set)
    return { label: `set ${JSON.stringify(action.set)}`, accepted: true }
  }
  const at = action.at === undefined ? '' : ` at ${action.at}`
  return {
    label: `propose ${JSON.stringify(action.propose)}${at}`,
    accepted: target.proposeEdit(action.propose, action.at),
  }
}

function observe(target: ReplayTarget, label: string, accepted: boolean): ReplayStep {
  const step: ReplayStep = {
    action: label,
    accepted,
    text: target.currentText(),
    valid: target.isValid(),
  }
  const result = target.result()
  if (result === undefined) {
    return step
  }
  if (result.ok) {
    step.value = result.value
  } else {
    step.error = result.error.message
  }
  return step
}

/** Run every action in order and record the state after each one */
export function replay(target: ReplayTarget, actions: readonly ReplayAction[]): ReplayStep[] {
  return actions.map((action) => {
    const { label, accepted } = apply(target, action)
    return observe(target, label, accepted)
  })
}

/** Replay a loaded script; `overrides` win over the script's own settings */
export function replayScript(script: ReplayScript, overrides: PresetOptions = {}): ReplayStep[] {
  const target = createPresetState(script.preset, {
    initialText: overrides.initialText ?? script.initialText,
    name: overrides.name ?? script.name,
    debug: overrides.debug,
  })
  return replay(target, script.steps)
}

function describeOutcome(step: ReplayStep): string {
  const parts: string[] = []
  if (!step.valid) parts.push('invalid')
  if (step.error !== undefined) {
    parts.push(`error: ${step.error}`)
  } else if ('value' in step) {
    parts.push(`value: ${step.value === undefined ? 'none' : JSON.stringify(step.value)}`)
  } else {
    parts.push('no result')
  }
  return parts.join(', ')
}

/**
 * One line per step, e.g. `[ok] type "4" -> "-4" (value: -4)`
 */
export function formatStep(step: ReplayStep): string {
  const mark = step.accepted ? '[ok]' : '[rejected]'
  return `${mark} ${step.action} -> ${JSON.stringify(step.text)} (${describeOutcome(step)})`
}
