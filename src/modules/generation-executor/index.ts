/**
 * generation-executor module: public API re-exports
 */

export type { GenerationExecutor } from './generation-executor.js'

export {
  GenerationExecutorImpl,
  createGenerationExecutor,
  backoffDelay,
  validateVariants,
} from './generation-executor-impl.js'

export type { GenerationExecutorOptions } from './generation-executor-impl.js'

export { buildRequestBody } from './request-builder.js'

export { MAX_ATTEMPTS, MIN_VARIANTS, MAX_VARIANTS } from './types.js'

export type { ExecuteRequest, ExecutorResult, RetryPolicy } from './types.js'
