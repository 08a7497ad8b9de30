/**
 * Checks applied to generated lists beyond their schema: item counts,
 * numbering, and references between items or to the character roster.
 *
 * Each check returns one message per violation; an empty array means pass.
 */

import type { CardinalityBounds } from '../config/config-schema.js'

export function checkCardinality(count: number, bounds: CardinalityBounds | null): string[] {
  if (bounds === null) return []
  if (count < bounds.min || count > bounds.max) {
    return [`expected between ${String(bounds.min)} and ${String(bounds.max)} items, got ${String(count)}`]
  }
  return []
}

/** Item numbers must run 1..N in list order */
export function checkNumbering(items: ReadonlyArray<{ number: number }>): string[] {
  const issues: string[] = []
  items.forEach((item, index) => {
    if (item.number !== index + 1) {
      issues.push(`item ${String(index + 1)} is numbered ${String(item.number)}`)
    }
  })
  return issues
}

function nameKey(name: string): string {
  return name.trim().toLowerCase()
}

/** Character names must be unique within the list (case-insensitive) */
export function checkUniqueNames(items: ReadonlyArray<{ name: string }>): string[] {
  const seen = new Set<string>()
  const issues: string[] = []
  for (const item of items) {
    const key = nameKey(item.name)
    if (seen.has(key)) issues.push(`duplicate character name "${item.name}"`)
    seen.add(key)
  }
  return issues
}

/**
 * Relationship keys must name another character in the same list.
 */
export function checkRelationships(
  items: ReadonlyArray<{ name: string; relationships?: Record<string, string> | undefined }>,
): string[] {
  const names = new Set(items.map((item) => nameKey(item.name)))
  const issues: string[] = []
  for (const item of items) {
    for (const other of Object.keys(item.relationships ?? {})) {
      if (nameKey(other) === nameKey(item.name)) {
        issues.push(`"${item.name}" lists a relationship with itself`)
      } else if (!names.has(nameKey(other))) {
        issues.push(`"${item.name}" has a relationship with unknown character "${other}"`)
      }
    }
  }
  return issues
}

/**
 * Character names mentioned by items must exist in the roster.
 */
export function checkKnownCharacters(
  label: string,
  items: ReadonlyArray<{ number: number; characters?: string[] | undefined }>,
  rosterNames: readonly string[],
): string[] {
  const roster = new Set(rosterNames.map(nameKey))
  const issues: string[] = []
  for (const item of items) {
    for (const name of item.characters ?? []) {
      if (!roster.has(nameKey(name))) {
        issues.push(`${label}[${String(item.number)}] references unknown character "${name}"`)
      }
    }
  }
  return issues
}

export { nameKey as normalizeCharacterName }
