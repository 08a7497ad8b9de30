/**
 * GenerationProvider interface definition
 *
 * The pluggable contract behind every generation call. Adding a provider
 * means writing a class that satisfies this interface and registering it
 * with the ProviderRegistry; the engine never names a concrete provider.
 *
 * @example
 * ```typescript
 * class EchoProvider implements GenerationProvider {
 *   readonly id = 'echo'
 *   readonly displayName = 'Echo'
 *   async healthCheck() { return { healthy: true } }
 *   async generate(request) { return { variants: [JSON.parse(request.body)] } }
 * }
 * ```
 */

import type {
  ProviderRequest,
  ProviderCallOptions,
  ProviderResult,
  ProviderHealthResult,
} from './types.js'

export type { ProviderRequest, ProviderCallOptions, ProviderResult, ProviderHealthResult }

/**
 * GenerationProvider: "given a request body and an output shape, return
 * structured content or fail".
 */
export interface GenerationProvider {
  /**
   * Unique identifier; the key used by routing rules and `--provider`.
   * @example "claude-cli"
   */
  readonly id: string

  /**
   * Human-readable name.
   * @example "Claude CLI"
   */
  readonly displayName: string

  /**
   * Check that the provider can serve requests.
   *
   * Must not throw: failures are reported as `{ healthy: false, error }`.
   */
  healthCheck(): Promise<ProviderHealthResult>

  /**
   * Produce `request.variants` unvalidated payloads.
   *
   * Failures must be thrown as CapabilityError so the executor can tell
   * transient ones (timeouts, rate limits, malformed output) from permanent
   * ones (policy rejections, a missing binary). Anything else thrown is
   * treated as transient.
   *
   * Implementations should stop work when `options.signal` is aborted.
   */
  generate(request: ProviderRequest, options: ProviderCallOptions): Promise<ProviderResult>
}
