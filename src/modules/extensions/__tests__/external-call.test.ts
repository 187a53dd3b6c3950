/**
 * Unit tests for invokeExternal / withTimeout
 */

import { describe, it, expect, vi } from 'vitest'
import { invokeExternal, withTimeout } from '../external-call.js'
import { ExtensionTimeoutError, TransientError } from '../../../core/errors.js'
import { sleep } from '../../../utils/helpers.js'

describe('withTimeout', () => {
  it('resolves when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve(7), 50, 'op')).resolves.toBe(7)
  })

  it('rejects with ExtensionTimeoutError when it does not', async () => {
    const slow = sleep(200).then(() => 'late')
    await expect(withTimeout(slow, 10, 'outline:java')).rejects.toThrow(
      'outline:java did not complete within 10ms',
    )
    await expect(withTimeout(sleep(200), 10, 'x')).rejects.toBeInstanceOf(ExtensionTimeoutError)
  })
})

describe('invokeExternal', () => {
  it('returns the value of a successful call', async () => {
    const result = await invokeExternal('analyze', () => 42, { timeoutMs: 50 })
    expect(result).toEqual({ ok: true, value: 42, attempts: 1 })
  })

  it('retries once and succeeds on the second attempt', async () => {
    const fn = vi.fn<() => string>()
    fn.mockImplementationOnce(() => {
      throw new Error('flaky')
    })
    fn.mockImplementationOnce(() => 'second')

    const result = await invokeExternal('triage:java', fn, { timeoutMs: 50 })

    expect(result).toEqual({ ok: true, value: 'second', attempts: 2 })
    expect(fn).toHaveBeenCalledTimes(2)
  })

  it('returns the final failure as data', async () => {
    const result = await invokeExternal(
      'verify',
      () => Promise.reject(new Error('checker crashed')),
      { timeoutMs: 50 },
    )

    expect(result.ok).toBe(false)
    expect(result.attempts).toBe(2)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TransientError)
      expect(result.error.message).toBe('verify failed: checker crashed')
      expect(result.error.context).toEqual({ operation: 'verify', cause: 'checker crashed' })
    }
  })

  it('treats a timeout as a failed attempt', async () => {
    const result = await invokeExternal('finalize', () => sleep(100), { timeoutMs: 5, retries: 0 })

    expect(result.attempts).toBe(1)
    expect(result.ok ? undefined : result.error.code).toBe('EXTENSION_TIMEOUT')
  })
})
