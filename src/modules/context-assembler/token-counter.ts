/**
 * Token estimates for context budgeting.
 *
 * Uses a simple heuristic: chars/4. Entity fields are measured in their
 * serialized form, which is what the capability receives.
 */

import { stableStringify } from '../../utils/helpers.js'

const CHARS_PER_TOKEN = 4

/**
 * Approximate the number of tokens in `text`: `Math.ceil(text.length / 4)`.
 */
export function countTokens(text: string): number {
  if (text.length === 0) return 0
  return Math.ceil(text.length / CHARS_PER_TOKEN)
}

/** Approximate tokens of a JSON-serializable value */
export function countValueTokens(value: unknown): number {
  return countTokens(stableStringify(value))
}
