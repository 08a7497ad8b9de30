/**
 * generation-pool module: public API re-exports
 */

export type { GenerationPool, PoolJob } from './generation-pool.js'
export { GenerationPoolImpl, createGenerationPool } from './generation-pool-impl.js'
