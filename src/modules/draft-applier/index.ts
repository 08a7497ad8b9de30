/**
 * draft-applier module: public API re-exports
 */

export { applyVariant } from './draft-applier.js'
export type { ApplyRequest, ApplyResult } from './types.js'
