import { z } from 'zod'

/**
 * Plain-data settings of a TypedTextState.
 *
 * Callbacks (parser, validator, format) are passed separately; only the
 * serialisable part is schema-checked.
 */
export const TypedTextSettingsSchema = z.object({
  /** Buffer contents at construction and after reset() */
  initialText: z.string().default(''),
  /** How pure deletions are gated */
  deletion: z.enum(['accept', 'validate']).default('accept'),
  /** Shown in log tags, e.g. `[TypedTextState:price]` */
  name: z.string().min(1).optional(),
  /** Log every rejected edit with console.debug */
  debug: z.boolean().default(false),
})

export type TypedTextSettings = z.infer<typeof TypedTextSettingsSchema>
export type TypedTextSettingsInput = z.input<typeof TypedTextSettingsSchema>

export interface TypedTextOptions<T> extends TypedTextSettingsInput {
  /** Renders a value back to text for setValue(); defaults to String() */
  format?: (value: T) => string
}

/** Defaults (static, for tests and types) */
export const DEFAULT_SETTINGS: TypedTextSettings = {
  initialText: '',
  deletion: 'accept',
  debug: false,
}

/**
 * Validate settings, falling back to the defaults with a warning when they
 * do not match the schema.
 */
export function resolveSettings(input: TypedTextSettingsInput = {}): TypedTextSettings {
  const result = TypedTextSettingsSchema.safeParse(input)
  if (result.success) {
    return result.data
  }

  console.warn('Invalid TypedTextState settings, using defaults:', result.error.message)
  return DEFAULT_SETTINGS
}
