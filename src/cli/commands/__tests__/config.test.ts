/**
 * Tests for `planwright config show|get|set`.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import type { MockInstance } from 'vitest'
import { mkdtempSync, readFileSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import yaml from 'js-yaml'
import { runConfigGet, runConfigSet, runConfigShow } from '../config.js'
import { EXIT_SUCCESS, EXIT_USAGE_ERROR } from '../../utils/command-context.js'

let projectRoot: string
let stdoutSpy: MockInstance<typeof process.stdout.write>
let stderrSpy: MockInstance<typeof process.stderr.write>

const output = (spy: MockInstance<typeof process.stdout.write>): string =>
  spy.mock.calls.map((call) => String(call[0])).join('')

function options(outputFormat: 'human' | 'json' = 'human') {
  return { projectRoot, outputFormat, version: '1.2.3', globalConfigDir: join(projectRoot, 'global') }
}

beforeEach(() => {
  projectRoot = mkdtempSync(join(tmpdir(), 'planwright-config-cmd-'))
  stdoutSpy = vi.spyOn(process.stdout, 'write').mockReturnValue(true)
  stderrSpy = vi.spyOn(process.stderr, 'write').mockReturnValue(true)
})

afterEach(() => {
  vi.restoreAllMocks()
  rmSync(projectRoot, { recursive: true, force: true })
})

describe('config show', () => {
  it('prints the merged defaults as YAML', async () => {
    const code = await runConfigShow(options())
    expect(code).toBe(EXIT_SUCCESS)

    const shown: unknown = yaml.load(output(stdoutSpy))
    expect(shown).toMatchObject({
      storage: { backend: 'file', root: '.planwright' },
      plan: { refine: { confidence_threshold: 95, max_iterations: 3 } },
    })
  })

  it('wraps the config in the JSON envelope', async () => {
    await runConfigShow(options('json'))
    const envelope: unknown = JSON.parse(output(stdoutSpy))
    expect(envelope).toMatchObject({ command: 'planwright config show', data: { triage: { fix_at_or_above: 'major' } } })
  })
})

describe('config get', () => {
  it('prints a scalar value', async () => {
    await runConfigGet({ ...options(), key: 'plan.verify.max_iterations' })
    expect(output(stdoutSpy)).toBe('5\n')
  })

  it('exits with a usage error for an unknown key', async () => {
    const code = await runConfigGet({ ...options(), key: 'plan.nope' })
    expect(code).toBe(EXIT_USAGE_ERROR)
    expect(output(stderrSpy)).toBe('Error: Unknown config key: plan.nope\n')
  })
})

describe('config set', () => {
  it('writes the coerced value to the project config file', async () => {
    const code = await runConfigSet({ ...options(), key: 'plan.outline.require_review', value: 'false' })

    expect(code).toBe(EXIT_SUCCESS)
    expect(output(stdoutSpy)).toBe('Set plan.outline.require_review = false\n')
    const written: unknown = yaml.load(readFileSync(join(projectRoot, '.planwright', 'config.yaml'), 'utf-8'))
    expect(written).toEqual({ plan: { outline: { require_review: false } } })
  })

  it('rejects a value the schema does not accept', async () => {
    const code = await runConfigSet({ ...options(), key: 'plan.verify.max_iterations', value: 'many' })
    expect(code).toBe(EXIT_USAGE_ERROR)
    expect(output(stderrSpy)).toMatch(/^Error: Invalid value for "plan\.verify\.max_iterations"/)
  })
})
