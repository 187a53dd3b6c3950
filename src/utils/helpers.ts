/**
 * General utility helpers for Planwright
 */

import { createHash } from 'node:crypto'

/**
 * Sleep for a given number of milliseconds
 * @param ms - Milliseconds to sleep
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Deep clone an object using structuredClone.
 * Does NOT support functions or symbols as keys.
 */
export function deepClone<T>(obj: T): T {
  return structuredClone(obj)
}

/**
 * Recursively freeze an object graph. Returns the same reference.
 */
export function deepFreeze<T>(obj: T): Readonly<T> {
  if (typeof obj !== 'object' || obj === null || Object.isFrozen(obj)) {
    return obj
  }
  for (const value of Object.values(obj)) {
    deepFreeze(value)
  }
  return Object.freeze(obj)
}

/**
 * Check if a value is a plain object (not an array, Date, or other special object)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto = Object.getPrototypeOf(value) as unknown
  return proto === Object.prototype || proto === null
}

/**
 * Turn a free-text title into a kebab-case identifier.
 * Falls back to "plan" when nothing usable remains.
 *
 * @example
 * toKebabCase('Add JWT auth!') // 'add-jwt-auth'
 */
export function toKebabCase(text: string, maxLength = 48): string {
  const slug = text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, maxLength)
    .replace(/-+$/g, '')
    .replace(/^[0-9-]+/, '')
  return slug === '' ? 'plan' : slug
}

/**
 * Short deterministic digest of the given parts (first 8 hex chars of sha256).
 */
export function shortHash(parts: ReadonlyArray<string | number | undefined>): string {
  const hash = createHash('sha256')
  hash.update(parts.map((p) => (p === undefined ? '' : String(p))).join('\u0000'))
  return hash.digest('hex').slice(0, 8)
}

/**
 * Format an unknown thrown value as a message string
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
