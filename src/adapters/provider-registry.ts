/**
 * ProviderRegistry: central registry for GenerationProvider instances
 *
 * Holds the configured providers and answers which one serves a task kind:
 * an explicit choice first, then the routing rule for the task kind, then
 * the default provider.
 */

import type { TaskKind } from '../core/types.js'
import { ConfigError, RequestError } from '../core/errors.js'
import type { RoutingConfig } from '../modules/config/config-schema.js'
import type { GenerationProvider } from './generation-provider.js'
import type { ProviderHealthResult } from './types.js'

/**
 * Result from one health check in checkAll().
 */
export interface ProviderHealthReport {
  providerId: string
  displayName: string
  health: ProviderHealthResult
}

/**
 * ProviderRegistry manages the set of available providers.
 *
 * Usage:
 * ```typescript
 * const registry = new ProviderRegistry(config.routing)
 * registry.register(new ScriptedProvider())
 * const provider = registry.resolve('scene_list')
 * ```
 */
export class ProviderRegistry {
  private readonly _providers = new Map<string, GenerationProvider>()
  private readonly _routing: RoutingConfig

  constructor(routing: RoutingConfig) {
    this._routing = routing
  }

  /**
   * Register a provider by its id.
   * Overwrites any existing provider with the same id.
   */
  register(provider: GenerationProvider): void {
    this._providers.set(provider.id, provider)
  }

  /**
   * @returns The provider, or undefined if not registered
   */
  get(id: string): GenerationProvider | undefined {
    return this._providers.get(id)
  }

  getAll(): GenerationProvider[] {
    return Array.from(this._providers.values())
  }

  /**
   * Pick the provider for a task kind.
   *
   * @throws {RequestError} when an explicitly requested provider is not registered
   * @throws {ConfigError} when the routed or default provider is not registered
   */
  resolve(taskKind: TaskKind, explicit?: string): GenerationProvider {
    if (explicit !== undefined) {
      const provider = this._providers.get(explicit)
      if (provider === undefined) {
        throw new RequestError(`Unknown provider "${explicit}"`, {
          provider: explicit,
          registered: Array.from(this._providers.keys()),
        })
      }
      return provider
    }

    const rule = this._routing.rules.find((r) => r.task_kind === taskKind)
    const id = rule?.provider ?? this._routing.default_provider
    const provider = this._providers.get(id)
    if (provider === undefined) {
      throw new ConfigError(`Provider "${id}" for ${taskKind} is not enabled`, {
        provider: id,
        taskKind,
        source: rule !== undefined ? 'routing rule' : 'default provider',
      })
    }
    return provider
  }

  /**
   * Run every provider's health check sequentially.
   * A provider that throws despite the contract is reported unhealthy.
   */
  async checkAll(): Promise<ProviderHealthReport[]> {
    const reports: ProviderHealthReport[] = []
    for (const provider of this._providers.values()) {
      let health: ProviderHealthResult
      try {
        health = await provider.healthCheck()
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err)
        health = { healthy: false, error: `Unexpected error during health check: ${message}` }
      }
      reports.push({ providerId: provider.id, displayName: provider.displayName, health })
    }
    return reports
  }
}
