/**
 * Unit tests for src/utils/logger.ts: level selection and redaction.
 */

import { describe, it, expect } from 'vitest'
import { Writable } from 'node:stream'
import pino from 'pino'
import { REDACT_PATHS, createLogger, childLogger } from '../logger.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** In-memory pino logger with the same redaction as createLogger */
function createCapturingLogger(name: string): { logger: pino.Logger; getLines: () => string[] } {
  const lines: string[] = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding: string, callback: () => void) {
      lines.push(chunk.toString().trim())
      callback()
    },
  })

  const logger = pino({ name, level: 'trace', redact: REDACT_PATHS }, stream)
  return { logger, getLines: () => lines }
}

function withEnv(vars: Record<string, string | undefined>, fn: () => void): void {
  const saved: Record<string, string | undefined> = {}
  for (const key of Object.keys(vars)) {
    saved[key] = process.env[key]
    const value = vars[key]
    if (value === undefined) delete process.env[key]
    else process.env[key] = value
  }
  try {
    fn()
  } finally {
    for (const [key, value] of Object.entries(saved)) {
      if (value === undefined) delete process.env[key]
      else process.env[key] = value
    }
  }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('createLogger', () => {
  it('honours an explicit level', () => {
    expect(createLogger('explicit', { level: 'error', pretty: false }).level).toBe('error')
  })

  it('uses LOG_LEVEL when set', () => {
    withEnv({ LOG_LEVEL: 'warn' }, () => {
      expect(createLogger('env-level', { pretty: false }).level).toBe('warn')
    })
  })

  it('uses info in production', () => {
    withEnv({ LOG_LEVEL: undefined, NODE_ENV: 'production' }, () => {
      expect(createLogger('prod', { pretty: false }).level).toBe('info')
    })
  })

  it('stays at warn for plain CLI use', () => {
    withEnv({ LOG_LEVEL: undefined, NODE_ENV: undefined }, () => {
      expect(createLogger('cli', { pretty: false }).level).toBe('warn')
    })
  })
})

describe('childLogger', () => {
  it('carries the parent level and adds bindings', () => {
    const parent = createLogger('parent-module', { level: 'warn', pretty: false })
    const child = childLogger(parent, { planId: 'add-login' })
    expect(child).not.toBe(parent)
    expect(child.level).toBe('warn')
    expect(child.bindings()).toMatchObject({ planId: 'add-login' })
  })
})

describe('redaction', () => {
  it('redacts top-level and nested credentials', () => {
    const { logger, getLines } = createCapturingLogger('redact-test')

    logger.info({ token: 'test-secret', handler: { api_key: 'test-secret' }, planId: 'p' }, 'calling handler')

    const lines = getLines()
    expect(lines).toHaveLength(1)
    const parsed: unknown = JSON.parse(lines[0] ?? '')
    expect(parsed).toMatchObject({ token: '[Redacted]', handler: { api_key: '[Redacted]' }, planId: 'p' })
  })
})
