/**
 * Human-readable rendering of generations, drafts, apply results and
 * instructions for the `loom` commands.
 */

import type { ProviderHealthReport } from '../../adapters/provider-registry.js'
import type { GenerationOutcome, GenerationStatusReport } from '../../core/orchestrator.js'
import { formatRef } from '../../core/types.js'
import type { ApplyResult } from '../../modules/draft-applier/types.js'
import type { Draft } from '../../persistence/queries/drafts.js'
import type { Instruction } from '../../persistence/queries/instructions.js'
import { formatTable } from '../utils/formatting.js'
import type { Column } from '../utils/formatting.js'

// ---------------------------------------------------------------------------
// Generations
// ---------------------------------------------------------------------------

function attempts(count: number): string {
  return count === 1 ? '1 attempt' : `${String(count)} attempts`
}

export function renderStatus(report: GenerationStatusReport): string {
  const lines = [`Generation ${report.generationId}: ${report.status} after ${attempts(report.attemptCount)}`]
  if (report.error !== null) {
    lines.push(`  Error [${report.errorCode ?? 'UNKNOWN'}]: ${report.error}`)
  }
  return lines.join('\n')
}

/**
 * Status line, the draft the generation produced and, in direct mode, what
 * was applied.
 */
export function renderOutcome(outcome: GenerationOutcome): string {
  const { generation } = outcome
  const sections = [
    renderStatus({
      generationId: generation.id,
      status: generation.status,
      attemptCount: generation.attempt_count,
      error: generation.error,
      errorCode: generation.error_code,
    }) + `\n  Mode: ${outcome.mode}`,
  ]

  // Failures after the attempt-chain succeeded (a refused apply) are not on the record
  if (outcome.error !== null && generation.error === null) {
    sections[0] += `\n  Apply failed [${outcome.error.code}]: ${outcome.error.message}`
  }
  if (outcome.draft !== null) sections.push(renderDraft(outcome.draft))
  if (outcome.applied !== null) sections.push(renderApplied(outcome.applied))
  return sections.join('\n\n')
}

// ---------------------------------------------------------------------------
// Drafts
// ---------------------------------------------------------------------------

export function renderDraft(draft: Draft): string {
  const lines = [
    `Draft ${draft.id} [${draft.status}] ${draft.content_kind} for ${draft.target_kind}:${draft.target_id}`,
  ]
  if (draft.created_from_draft_id !== null) lines.push(`  Revises: ${draft.created_from_draft_id}`)
  if (draft.feedback !== null) lines.push(`  Feedback: ${draft.feedback}`)
  if (draft.selected_variant !== null) lines.push(`  Selected variant: ${String(draft.selected_variant)}`)
  if (draft.system_error !== null) lines.push(`  Error: ${draft.system_error}`)
  draft.variants.forEach((variant, index) => {
    lines.push(`  [${String(index)}] ${JSON.stringify(variant)}`)
  })
  return lines.join('\n')
}

export function renderDrafts(drafts: Draft[]): string {
  return drafts.map(renderDraft).join('\n\n')
}

export function renderApplied(result: ApplyResult): string {
  const lines = [`Applied to ${formatRef(result.target)} (version ${String(result.target.version)})`]
  if (result.created.length > 0) {
    lines.push(`  Created: ${result.created.map((entity) => formatRef(entity)).join(', ')}`)
  }
  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// Instructions
// ---------------------------------------------------------------------------

const INSTRUCTION_COLUMNS: Column<Instruction>[] = [
  { header: 'ID', value: (i) => i.id },
  { header: 'Kind', value: (i) => i.content_kind },
  { header: 'Priority', value: (i) => String(i.priority) },
  { header: 'Directive', value: (i) => i.directive ?? '-' },
  { header: 'Active', value: (i) => (i.active === 1 ? 'yes' : 'no') },
  { header: 'Text', value: (i) => i.text, maxWidth: 80 },
]

export function renderInstructionTable(instructions: Instruction[]): string {
  return formatTable(INSTRUCTION_COLUMNS, instructions)
}

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------

const PROVIDER_COLUMNS: Column<ProviderHealthReport>[] = [
  { header: 'ID', value: (r) => r.providerId },
  { header: 'Name', value: (r) => r.displayName },
  { header: 'Healthy', value: (r) => (r.health.healthy ? 'yes' : 'no') },
  { header: 'Detail', value: (r) => (r.health.healthy ? (r.health.version ?? '') : (r.health.error ?? '')), maxWidth: 80 },
]

export function renderProviderTable(reports: ProviderHealthReport[]): string {
  return formatTable(PROVIDER_COLUMNS, reports)
}
