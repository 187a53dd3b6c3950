/**
 * Unit tests for config-system-impl.ts
 *
 * Tests:
 *  - Hierarchy loading (defaults < global < project < env < CLI)
 *  - Config validation errors
 *  - get() dot-notation access
 *  - set() with project file update
 *  - Frozen config
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, writeFile, readFile, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import yaml from 'js-yaml'
import { createConfigSystem, deepMerge, setByPath, getByPath, coerceScalar } from '../config-system-impl.js'
import type { ConfigSystemOptions } from '../config-system.js'
import { ConfigError } from '../../../core/errors.js'

// ---------------------------------------------------------------------------
// Test setup: temporary directories
// ---------------------------------------------------------------------------

let testDir: string
let projectConfigDir: string
let globalConfigDir: string

beforeEach(async () => {
  testDir = join(tmpdir(), `planwright-config-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  projectConfigDir = join(testDir, 'project', '.planwright')
  globalConfigDir = join(testDir, 'global', '.planwright')
  await mkdir(projectConfigDir, { recursive: true })
  await mkdir(globalConfigDir, { recursive: true })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
})

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createSystem(overrides: Partial<ConfigSystemOptions> = {}): ReturnType<typeof createConfigSystem> {
  return createConfigSystem({
    projectConfigDir,
    globalConfigDir,
    env: {},
    ...overrides,
  })
}

async function writeYaml(dir: string, content: string): Promise<void> {
  await writeFile(join(dir, 'config.yaml'), content, 'utf-8')
}

// ---------------------------------------------------------------------------
// Default config loading
// ---------------------------------------------------------------------------

describe('ConfigSystem - default config', () => {
  it('returns default config when no config files exist', async () => {
    const system = createSystem()
    await system.load()
    const config = system.getConfig()
    expect(config.config_format_version).toBe('1')
    expect(config.plan.refine.confidence_threshold).toBe(95)
    expect(config.plan.verify.max_iterations).toBe(5)
    expect(config.plan.outline.max_iterations).toBe(3)
    expect(config.plan.plan.profiles).toEqual(['implementation', 'module_testing'])
    expect(config.triage.fix_at_or_above).toBe('major')
    expect(config.storage.backend).toBe('file')
  })

  it('throws ConfigError if getConfig called before load', () => {
    const system = createSystem()
    expect(system.isLoaded).toBe(false)
    expect(() => system.getConfig()).toThrow(ConfigError)
  })

  it('returns a frozen config', async () => {
    const system = createSystem()
    await system.load()
    const config = system.getConfig()
    expect(Object.isFrozen(config)).toBe(true)
    expect(Object.isFrozen(config.plan.verify)).toBe(true)
    expect(Object.isFrozen(config.plan.plan.profiles)).toBe(true)
  })

  it('treats an empty config file as no overrides', async () => {
    await writeYaml(projectConfigDir, '')
    const system = createSystem()
    await system.load()
    expect(system.get('plan.verify.max_iterations')).toBe(5)
  })
})

// ---------------------------------------------------------------------------
// Hierarchy
// ---------------------------------------------------------------------------

describe('ConfigSystem - hierarchy', () => {
  it('global config overrides defaults', async () => {
    await writeYaml(globalConfigDir, 'plan:\n  verify:\n    max_iterations: 7\n')
    const system = createSystem()
    await system.load()
    expect(system.get('plan.verify.max_iterations')).toBe(7)
    // sibling keys keep their defaults
    expect(system.get('plan.verify.checks')).toEqual(['quality', 'build', 'domain-technical', 'test-coverage'])
  })

  it('project config overrides global config', async () => {
    await writeYaml(globalConfigDir, 'plan:\n  verify:\n    max_iterations: 7\n')
    await writeYaml(projectConfigDir, 'plan:\n  verify:\n    max_iterations: 2\n')
    const system = createSystem()
    await system.load()
    expect(system.get('plan.verify.max_iterations')).toBe(2)
  })

  it('env vars override project config', async () => {
    await writeYaml(projectConfigDir, 'plan:\n  refine:\n    confidence_threshold: 80\n')
    const system = createSystem({ env: { PLANWRIGHT_CONFIDENCE_THRESHOLD: '60' } })
    await system.load()
    expect(system.get('plan.refine.confidence_threshold')).toBe(60)
  })

  it('CLI overrides win over env vars', async () => {
    const system = createSystem({
      env: { PLANWRIGHT_STORAGE_BACKEND: 'sqlite' },
      cliOverrides: { storage: { backend: 'file' } },
    })
    await system.load()
    expect(system.get('storage.backend')).toBe('file')
  })

  it('ignores invalid env overrides', async () => {
    const system = createSystem({ env: { PLANWRIGHT_FIX_AT_OR_ABOVE: 'catastrophic' } })
    await system.load()
    expect(system.get('triage.fix_at_or_above')).toBe('major')
  })

  it('replaces arrays instead of merging them', async () => {
    await writeYaml(projectConfigDir, 'plan:\n  plan:\n    profiles:\n      - implementation\n')
    const system = createSystem()
    await system.load()
    expect(system.get('plan.plan.profiles')).toEqual(['implementation'])
  })
})

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe('ConfigSystem - validation', () => {
  it('rejects unknown keys in a config file', async () => {
    await writeYaml(projectConfigDir, 'plan:\n  verify:\n    max_loops: 2\n')
    const system = createSystem()
    await expect(system.load()).rejects.toThrow(ConfigError)
  })

  it('rejects out-of-range values', async () => {
    await writeYaml(projectConfigDir, 'plan:\n  refine:\n    confidence_threshold: 150\n')
    const system = createSystem()
    await expect(system.load()).rejects.toThrow(/confidence_threshold/)
  })

  it('wraps YAML syntax errors in ConfigError', async () => {
    await writeYaml(projectConfigDir, 'plan: [unclosed\n')
    const system = createSystem()
    await expect(system.load()).rejects.toThrow(ConfigError)
  })
})

// ---------------------------------------------------------------------------
// get / set
// ---------------------------------------------------------------------------

describe('ConfigSystem - get/set', () => {
  it('get returns undefined for an unknown key', async () => {
    const system = createSystem()
    await system.load()
    expect(system.get('plan.nope.value')).toBeUndefined()
  })

  it('set persists a scalar to the project file and reloads', async () => {
    const system = createSystem()
    await system.load()
    await system.set('plan.verify.max_iterations', 9)

    expect(system.get('plan.verify.max_iterations')).toBe(9)
    const written = yaml.load(await readFile(join(projectConfigDir, 'config.yaml'), 'utf-8'))
    expect(written).toEqual({ plan: { verify: { max_iterations: 9 } } })
  })

  it('set rejects an unknown key', async () => {
    const system = createSystem()
    await system.load()
    await expect(system.set('plan.verify.unknown', 1)).rejects.toThrow('Unknown config key: plan.verify.unknown')
  })

  it('set rejects a section key', async () => {
    const system = createSystem()
    await system.load()
    await expect(system.set('plan.verify', 1)).rejects.toThrow(ConfigError)
  })

  it('set rejects an invalid value', async () => {
    const system = createSystem()
    await system.load()
    await expect(system.set('storage.backend', 'postgres')).rejects.toThrow(/Invalid value for "storage.backend"/)
  })
})

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

describe('config helpers', () => {
  it('deepMerge merges nested objects and skips undefined', () => {
    expect(deepMerge({ a: { b: 1, c: 2 }, d: 3 }, { a: { c: 4 }, d: undefined })).toEqual({
      a: { b: 1, c: 4 },
      d: 3,
    })
  })

  it('setByPath creates intermediate objects without mutating the input', () => {
    const input = { a: 1 }
    expect(setByPath(input, 'x.y.z', true)).toEqual({ a: 1, x: { y: { z: true } } })
    expect(input).toEqual({ a: 1 })
  })

  it('getByPath stops at non-objects', () => {
    expect(getByPath({ a: 5 }, 'a.b')).toBeUndefined()
  })

  it('coerceScalar converts booleans and numbers', () => {
    expect(coerceScalar('true')).toBe(true)
    expect(coerceScalar('12')).toBe(12)
    expect(coerceScalar('0.5')).toBe(0.5)
    expect(coerceScalar('major')).toBe('major')
  })
})
