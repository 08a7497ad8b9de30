/**
 * Deterministic request documents for generation providers.
 *
 * The body is sorted-key JSON built only from the frozen context and the
 * task definition, so every attempt of a chain sends identical bytes.
 */

import { stableStringify } from '../../utils/helpers.js'
import type { GenerationContext } from '../context-assembler/types.js'
import type { TaskDefinition } from '../task-registry/types.js'

/**
 * Build the request body for one generation.
 *
 * Instructions are flattened to their texts, strongest first.
 */
export function buildRequestBody(
  context: GenerationContext,
  definition: TaskDefinition,
  variants: number,
): string {
  return stableStringify(
    {
      task: definition.kind,
      label: definition.label,
      variants,
      output: {
        shape: definition.shape,
        itemsKey: definition.list?.itemsKey ?? null,
        cardinality: context.cardinality,
      },
      context: {
        targetRef: context.targetRef,
        target: context.target,
        parent: context.parent,
        ancestors: context.ancestors,
        siblings: context.siblings,
        existingChildren: context.existingChildren,
        roster: context.roster,
        rosterNames: context.rosterNames,
        styleGuide: context.styleGuide,
        instructions: context.instructions.map((i) => i.text),
        userInput: context.userInput,
        feedback: context.feedback,
        truncated: context.truncated,
      },
    },
    2,
  )
}
