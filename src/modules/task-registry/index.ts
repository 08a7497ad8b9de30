/**
 * task-registry module: public API re-exports
 */

export {
  TASK_DEFINITIONS,
  SHOT_TYPES,
  getTaskDefinition,
  listItems,
} from './task-definitions.js'

export {
  checkCardinality,
  checkNumbering,
  checkUniqueNames,
  checkRelationships,
  checkKnownCharacters,
  normalizeCharacterName,
} from './cross-references.js'

export type {
  TaskDefinition,
  ListSpec,
  OutputShape,
  ValidationRules,
  ValidationOutcome,
} from './types.js'
