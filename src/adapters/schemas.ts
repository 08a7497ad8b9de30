/**
 * Zod validation schemas for provider output envelopes
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Claude CLI
// ---------------------------------------------------------------------------

/**
 * The JSON document printed by `claude -p --output-format json`.
 * Only the fields the provider reads are declared; the rest pass through.
 */
export const ClaudeCliEnvelopeSchema = z
  .object({
    type: z.string().optional(),
    subtype: z.string().optional(),
    is_error: z.boolean().optional(),
    result: z.string().optional(),
    usage: z
      .object({
        input_tokens: z.number().int().nonnegative().optional(),
        output_tokens: z.number().int().nonnegative().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough()

export type ClaudeCliEnvelope = z.infer<typeof ClaudeCliEnvelopeSchema>

// ---------------------------------------------------------------------------
// Variant envelope
// ---------------------------------------------------------------------------

/**
 * Every provider answers with `{ "variants": [ ... ] }`; the items are
 * validated later against the task's own schema.
 */
export const VariantEnvelopeSchema = z.object({
  variants: z.array(z.unknown()).min(1),
})

export type VariantEnvelope = z.infer<typeof VariantEnvelopeSchema>

/** Strip markdown code fences from model output (e.g. ```json ... ```) */
export function stripCodeFences(raw: string): string {
  return raw.trim().replace(/^```(?:json)?\s*/i, '').replace(/\s*```\s*$/, '').trim()
}
