/**
 * Error definitions for Planwright
 * Provides the structured error hierarchy used across the orchestrator.
 *
 * Structural errors (ValidationError, DependencyCycleError,
 * IterationLimitExceededError) abort the current phase. Unit-level errors
 * (ExecutionFailureError, TransientError) are recorded as data on the task or
 * as a blocking finding and never unwind across a phase boundary.
 */

/** Base error class for all Planwright errors */
export class PlanwrightError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'PlanwrightError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PlanwrightError)
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

/** Malformed request, deliverable, task or finding structure */
export class ValidationError extends PlanwrightError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'VALIDATION_ERROR', context)
    this.name = 'ValidationError'
  }
}

/** A domain has no handler registered for the requested capability */
export class ExtensionNotFoundError extends PlanwrightError {
  constructor(domain: string, capability: string) {
    super(
      `No '${capability}' extension registered for domain '${domain}'`,
      'EXTENSION_NOT_FOUND',
      { domain, capability }
    )
    this.name = 'ExtensionNotFoundError'
  }
}

/** Deliverables or tasks reference each other cyclically */
export class DependencyCycleError extends PlanwrightError {
  constructor(cycle: string[]) {
    super(`Circular dependency detected: ${cycle.join(' -> ')}`, 'DEPENDENCY_CYCLE', {
      cycle,
    })
    this.name = 'DependencyCycleError'
  }
}

/** A loop-eligible phase exceeded its configured ceiling */
export class IterationLimitExceededError extends PlanwrightError {
  constructor(
    phase: string,
    limit: number,
    context: Record<string, unknown> = {}
  ) {
    super(
      `Iteration limit exceeded in phase ${phase}: max_iterations=${String(limit)}`,
      'ITERATION_LIMIT_EXCEEDED',
      { phase, limit, ...context }
    )
    this.name = 'IterationLimitExceededError'
  }
}

/** A task step failed irrecoverably */
export class ExecutionFailureError extends PlanwrightError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'EXECUTION_FAILURE', context)
    this.name = 'ExecutionFailureError'
  }
}

/** A single retryable failure in an external call */
export class TransientError extends PlanwrightError {
  constructor(
    message: string,
    context: Record<string, unknown> = {},
    code = 'TRANSIENT_ERROR'
  ) {
    super(message, code, context)
    this.name = 'TransientError'
  }
}

/** An external call did not return within the configured timeout */
export class ExtensionTimeoutError extends TransientError {
  constructor(operation: string, timeoutMs: number) {
    super(
      `${operation} did not complete within ${String(timeoutMs)}ms`,
      { operation, timeoutMs },
      'EXTENSION_TIMEOUT'
    )
    this.name = 'ExtensionTimeoutError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends PlanwrightError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** No persisted plan exists for the given id */
export class PlanNotFoundError extends PlanwrightError {
  constructor(planId: string) {
    super(`Plan not found: ${planId}`, 'PLAN_NOT_FOUND', { planId })
    this.name = 'PlanNotFoundError'
  }
}

/** Reading or writing plan artifacts failed */
export class PlanStoreError extends PlanwrightError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'PLAN_STORE_ERROR', context)
    this.name = 'PlanStoreError'
  }
}

/** Another writer committed the plan since it was loaded */
export class PlanConflictError extends PlanwrightError {
  constructor(planId: string, expected: number, actual: number) {
    super(
      `Plan ${planId} was changed by another writer (expected revision ${String(expected)}, found ${String(actual)})`,
      'PLAN_CONFLICT',
      { planId, expected, actual },
    )
    this.name = 'PlanConflictError'
  }
}

/** A phase transition that the lifecycle does not allow */
export class InvalidTransitionError extends PlanwrightError {
  constructor(from: string, to: string) {
    super(`Invalid phase transition: ${from} -> ${to}`, 'INVALID_TRANSITION', { from, to })
    this.name = 'InvalidTransitionError'
  }
}

/** Operation is not valid in the plan's current state (e.g. resuming a plan that is not waiting) */
export class PlanStateError extends PlanwrightError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'PLAN_STATE_ERROR', context)
    this.name = 'PlanStateError'
  }
}

/** Structural errors abort the current phase; everything else is contained as data */
export function isStructuralError(err: unknown): err is PlanwrightError {
  return (
    err instanceof ValidationError ||
    err instanceof DependencyCycleError ||
    err instanceof IterationLimitExceededError
  )
}
