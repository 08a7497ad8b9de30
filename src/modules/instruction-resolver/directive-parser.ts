/**
 * Translates free-text instruction wording into an enumerated directive.
 *
 * Runs once when an instruction is stored; the mode controller only ever
 * reads the stored directive.
 */

import type { Directive } from '../../core/types.js'

/** Phrases asking for output to wait for a human decision */
const REVIEW_PHRASES: readonly string[] = [
  "don't skip review",
  'do not skip review',
  'review first',
  'require review',
  'requires review',
  'needs review',
  'review mode',
  'let me review',
  'ask before applying',
]

/** Phrases asking for output to be applied without review */
const DIRECT_PHRASES: readonly string[] = [
  'no review',
  'skip review',
  'without review',
  'auto-apply',
  'auto apply',
  'apply directly',
  'direct mode',
  'unattended',
]

/**
 * Return the directive expressed by `text`, or null when it expresses none.
 * Review phrases are checked first so that negated direct phrases
 * ("do not skip review") resolve to review.
 */
export function parseDirective(text: string): Directive | null {
  const normalized = text.toLowerCase().replace(/\s+/g, ' ')
  if (REVIEW_PHRASES.some((phrase) => normalized.includes(phrase))) return 'review'
  if (DIRECT_PHRASES.some((phrase) => normalized.includes(phrase))) return 'direct'
  return null
}
