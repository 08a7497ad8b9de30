/**
 * Error definitions for StoryLoom
 * Structured error hierarchy shared by every engine component
 */

/** Base error class for all StoryLoom errors */
export class LoomError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'LoomError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LoomError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Broken hierarchy: an entity's ancestor chain cannot be walked to its root */
export class ScopeError extends LoomError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'SCOPE_ERROR', context)
    this.name = 'ScopeError'
  }
}

/** Data required to build a generation context is missing */
export class ContextError extends LoomError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONTEXT_ERROR', context)
    this.name = 'ContextError'
  }
}

/** Generation output violates its declared schema, cardinality or cross-references */
export class ValidationError extends LoomError {
  public readonly issues: string[]

  constructor(message: string, issues: string[] = [], context: Record<string, unknown> = {}) {
    super(message, 'VALIDATION_ERROR', { issues, ...context })
    this.name = 'ValidationError'
    this.issues = issues
  }
}

/** Why a generation capability call failed */
export type CapabilityFailureReason =
  | 'timeout'
  | 'rate_limit'
  | 'unavailable'
  | 'malformed_output'
  | 'policy_rejection'
  | 'unsupported'

/** The external generation capability failed; `transient` decides whether it is retried */
export class CapabilityError extends LoomError {
  public readonly transient: boolean
  public readonly reason: CapabilityFailureReason

  constructor(
    message: string,
    reason: CapabilityFailureReason,
    transient: boolean,
    context: Record<string, unknown> = {}
  ) {
    super(message, 'CAPABILITY_ERROR', { reason, transient, ...context })
    this.name = 'CapabilityError'
    this.reason = reason
    this.transient = transient
  }
}

/** A mutation would violate the single-pending-draft or single-writer invariant */
export class ConflictError extends LoomError {
  constructor(message: string, context: Record<string, unknown> = {}, code = 'CONFLICT') {
    super(message, code, context)
    this.name = 'ConflictError'
  }
}

/** A draft lifecycle event is not allowed from the draft's current status */
export class IllegalTransitionError extends ConflictError {
  public readonly from: string
  public readonly event: string

  constructor(draftId: string, from: string, event: string) {
    super(
      `Draft ${draftId} cannot handle "${event}" while ${from}`,
      { draftId, from, event },
      'ILLEGAL_TRANSITION'
    )
    this.name = 'IllegalTransitionError'
    this.from = from
    this.event = event
  }
}

/** A referenced record does not exist */
export class NotFoundError extends LoomError {
  constructor(kind: string, id: string) {
    super(`${kind} not found: ${id}`, 'NOT_FOUND', { kind, id })
    this.name = 'NotFoundError'
  }
}

/** The caller supplied an invalid argument (e.g. an out-of-range variant index) */
export class RequestError extends LoomError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'INVALID_REQUEST', context)
    this.name = 'RequestError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends LoomError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** A generation was cancelled; raised internally at a retry boundary */
export class CancelledError extends LoomError {
  constructor(generationId: string) {
    super(`Generation ${generationId} was cancelled`, 'CANCELLED', { generationId })
    this.name = 'CancelledError'
  }
}

/** Work was submitted to, or still queued in, a pool that is shutting down */
export class PoolShutdownError extends LoomError {
  constructor(jobId: string) {
    super(`Generation pool is shutting down; ${jobId} was not started`, 'POOL_SHUTDOWN', { jobId })
    this.name = 'PoolShutdownError'
  }
}

// ---------------------------------------------------------------------------
// Retry classification
// ---------------------------------------------------------------------------

export interface ErrorClassification {
  retryable: boolean
  error: LoomError
}

/**
 * Decide whether a failure inside an attempt-chain may be retried.
 *
 * Unknown errors are wrapped as transient capability failures; anything the
 * engine raised itself keeps its own semantics.
 */
export function classifyError(err: unknown): ErrorClassification {
  if (err instanceof ValidationError) return { retryable: true, error: err }
  if (err instanceof CapabilityError) return { retryable: err.transient, error: err }
  if (err instanceof LoomError) return { retryable: false, error: err }

  const message = err instanceof Error ? err.message : String(err)
  return {
    retryable: true,
    error: new CapabilityError(message, 'unavailable', true, { wrapped: true }),
  }
}
