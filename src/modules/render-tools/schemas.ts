/**
 * Zod validation schemas for render tool input.
 */

import { z } from 'zod'
import { InvalidInputError } from '../../core/errors.js'

/** Upper bound on compiler passes a single request may ask for */
export const MAX_RUNS = 10

const JobOptionsShape = {
  jobname: z.string().nullish(),
  compile: z.boolean().default(true),
  /** Values below 1 still mean one pass */
  runs: z.number().int().max(MAX_RUNS).optional(),
}

/**
 * Input of `render_latex_document`.
 */
export const RenderLatexInputSchema = z
  .object({
    tex: z.string(),
    ...JobOptionsShape,
  })
  .strict()

export type RenderLatexInput = z.input<typeof RenderLatexInputSchema>
export type ParsedRenderLatexInput = z.output<typeof RenderLatexInputSchema>

/**
 * Input of `render_template_document`.
 */
export const RenderTemplateInputSchema = z
  .object({
    templateName: z.string().min(1),
    context: z.record(z.string(), z.unknown()).default({}),
    ...JobOptionsShape,
  })
  .strict()

export type RenderTemplateInput = z.input<typeof RenderTemplateInputSchema>
export type ParsedRenderTemplateInput = z.output<typeof RenderTemplateInputSchema>

// ---------------------------------------------------------------------------
// Validator helpers
// ---------------------------------------------------------------------------

/**
 * Generic validator that wraps Zod parse and throws InvalidInputError on failure.
 * @param schema  Zod schema to validate against
 * @param data    Unknown data to parse
 * @param label   Human-readable label for error messages
 */
export function validateWithSchema<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  label: string
): T {
  const result = schema.safeParse(data)
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ')
    throw new InvalidInputError(`Validation failed for ${label}: ${issues}`, {
      label,
      issues: result.error.issues,
    })
  }
  return result.data
}
