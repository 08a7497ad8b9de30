/**
 * Lifecycle container for the engine's resource-owning services.
 *
 * Components are wired by constructor injection in core/orchestrator-impl.ts.
 * Only the ones that hold resources (the database, the generation pool)
 * register here, so that start-up and teardown happen in dependency order.
 */

import { createLogger } from '../utils/logger.js'

const logger = createLogger('services')

export interface BaseService {
  /** Acquire resources and start accepting work */
  initialize(): Promise<void>

  /** Release resources; called in reverse start order */
  shutdown(): Promise<void>
}

interface Registration {
  name: string
  service: BaseService
  started: boolean
}

/**
 * @example
 * const services = new ServiceRegistry()
 * services.register('database', databaseService)
 * services.register('generationPool', pool)
 * await services.initializeAll()
 * await services.shutdownAll()   // generationPool first, then database
 */
export class ServiceRegistry {
  private readonly _registrations: Registration[] = []

  register(name: string, service: BaseService): void {
    if (this._find(name) !== undefined) {
      throw new Error(`Service "${name}" is already registered`)
    }
    this._registrations.push({ name, service, started: false })
  }

  get(name: string): BaseService {
    const registration = this._find(name)
    if (registration === undefined) {
      throw new Error(`Service "${name}" is not registered`)
    }
    return registration.service
  }

  isStarted(name: string): boolean {
    return this._find(name)?.started ?? false
  }

  get serviceNames(): string[] {
    return this._registrations.map((r) => r.name)
  }

  /**
   * Start services in registration order.
   *
   * If one fails, the services already started are shut down again in
   * reverse and the start-up error is rethrown. Teardown failures during that
   * rollback are logged.
   */
  async initializeAll(): Promise<void> {
    for (const registration of this._registrations) {
      if (registration.started) continue
      try {
        await registration.service.initialize()
      } catch (err) {
        try {
          await this.shutdownAll()
        } catch (rollbackErr) {
          logger.error({ err: rollbackErr, service: registration.name }, 'Rollback after failed start-up did not complete')
        }
        throw err
      }
      registration.started = true
    }
  }

  /**
   * Shut down every started service in reverse start order. Each service gets
   * its turn even when an earlier one fails; the failures are then thrown
   * together as one AggregateError.
   */
  async shutdownAll(): Promise<void> {
    const errors: Error[] = []
    for (const registration of [...this._registrations].reverse()) {
      if (!registration.started) continue
      registration.started = false
      try {
        await registration.service.shutdown()
      } catch (err) {
        errors.push(err instanceof Error ? err : new Error(String(err)))
      }
    }
    if (errors.length > 0) {
      throw new AggregateError(errors, `Shutdown errors in ${String(errors.length)} service(s)`)
    }
  }

  private _find(name: string): Registration | undefined {
    return this._registrations.find((r) => r.name === name)
  }
}
