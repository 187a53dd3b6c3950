/**
 * invokeExternal: the single path for calls into collaborators the
 * orchestrator does not own (extension handlers, executors, the verifier,
 * the finalizer).
 *
 * Each attempt runs under a wall-clock timeout. A thrown error or timeout is
 * retried locally (once by default); the final failure is returned as data so
 * the caller can record it as a blocking finding.
 */

import type pino from 'pino'
import { ExtensionTimeoutError, TransientError } from '../../core/errors.js'
import { errorMessage } from '../../utils/helpers.js'

export interface ExternalCallOptions {
  timeoutMs: number
  /** Additional attempts after the first (default 1) */
  retries?: number
  logger?: pino.Logger
}

export type ExternalCallResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: TransientError; attempts: number }

/** Reject with ExtensionTimeoutError when `promise` does not settle within `timeoutMs` */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ExtensionTimeoutError(operation, timeoutMs)), timeoutMs)
  })
  return Promise.race([promise, timeout]).finally(() => {
    if (timer !== undefined) clearTimeout(timer)
  })
}

/**
 * Invoke an external collaborator with timeout and local retry.
 *
 * @param operation - Label used in logs and error messages (e.g. "triage:java")
 */
export async function invokeExternal<T>(
  operation: string,
  fn: () => Promise<T> | T,
  options: ExternalCallOptions,
): Promise<ExternalCallResult<T>> {
  const maxAttempts = 1 + (options.retries ?? 1)
  let lastError: TransientError | undefined

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      // Promise.resolve().then() turns a synchronous throw into a rejection
      const value = await withTimeout(Promise.resolve().then(fn), options.timeoutMs, operation)
      return { ok: true, value, attempts: attempt }
    } catch (err) {
      lastError =
        err instanceof TransientError
          ? err
          : new TransientError(`${operation} failed: ${errorMessage(err)}`, { operation, cause: errorMessage(err) })
      if (attempt < maxAttempts) {
        options.logger?.warn({ operation, attempt, err: lastError.message }, 'External call failed; retrying')
      }
    }
  }

  const error = lastError ?? new TransientError(`${operation} failed`, { operation })
  options.logger?.warn({ operation, attempts: maxAttempts, err: error.message }, 'External call failed after retry')
  return { ok: false, error, attempts: maxAttempts }
}
