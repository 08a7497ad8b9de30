/**
 * Mode controller: decides whether generated output is applied directly or
 * waits in review.
 *
 * A pure function of already-resolved instructions. It never walks the
 * hierarchy and never re-reads instruction text.
 */

import type { GenerationMode } from '../../core/types.js'
import type { ResolvedInstruction } from '../instruction-resolver/types.js'

export const DEFAULT_MODE: GenerationMode = 'review'

export interface ModeDecision {
  mode: GenerationMode
  /** What decided the mode */
  source: 'override' | 'instruction' | 'default'
  /** Id of the deciding instruction when source is "instruction" */
  instructionId?: string
}

/**
 * Pick the generation mode. `instructions` must already be in resolver order
 * (strongest first); the first one carrying a directive wins. A caller
 * override beats every instruction.
 */
export function decideMode(
  instructions: readonly ResolvedInstruction[],
  override?: GenerationMode,
): ModeDecision {
  if (override !== undefined) return { mode: override, source: 'override' }

  const deciding = instructions.find((instruction) => instruction.directive !== null)
  if (deciding !== undefined && deciding.directive !== null) {
    return { mode: deciding.directive, source: 'instruction', instructionId: deciding.id }
  }
  return { mode: DEFAULT_MODE, source: 'default' }
}
