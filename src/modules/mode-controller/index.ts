/**
 * mode-controller module: public API re-exports
 */

export { decideMode, DEFAULT_MODE } from './mode-controller.js'
export type { ModeDecision } from './mode-controller.js'
