/**
 * ConfigSystem implementation: loads configuration in hierarchy order and
 * exposes get/set operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.planwright/config.yaml)
 *     → project config      (./.planwright/config.yaml)
 *     → environment vars    (PLANWRIGHT_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, writeFile, mkdir, access } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { homedir } from 'node:os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { deepClone, deepFreeze, errorMessage, isPlainObject } from '../../utils/helpers.js'
import { ConfigError } from '../../core/errors.js'
import {
  PlanwrightConfigSchema,
  PartialPlanwrightConfigSchema,
  type PlanwrightConfig,
  type PartialPlanwrightConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

/**
 * Merge `override` into `base`. Nested plain objects merge key by key;
 * arrays and scalars replace. Undefined values in the override are skipped.
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const current = result[key]
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor / setter
// ---------------------------------------------------------------------------

/**
 * Get a value from a nested object using dot-notation key.
 */
export function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/**
 * Return a copy of `obj` with `path` set to `value`.
 * Creates intermediate objects as needed.
 */
export function setByPath(
  obj: Record<string, unknown>,
  path: string,
  value: unknown
): Record<string, unknown> {
  const [head, ...rest] = path.split('.')
  if (head === undefined || head === '') return obj
  if (rest.length === 0) return { ...obj, [head]: value }
  const child = obj[head]
  return { ...obj, [head]: setByPath(isPlainObject(child) ? child : {}, rest.join('.'), value) }
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of PLANWRIGHT_ environment variable names to config paths.
 * Only scalar values can be overridden from the environment.
 */
export const ENV_VAR_MAP: Record<string, string> = {
  PLANWRIGHT_LOG_LEVEL: 'global.log_level',
  PLANWRIGHT_CONFIDENCE_THRESHOLD: 'plan.refine.confidence_threshold',
  PLANWRIGHT_REFINE_MAX_ITERATIONS: 'plan.refine.max_iterations',
  PLANWRIGHT_OUTLINE_MAX_ITERATIONS: 'plan.outline.max_iterations',
  PLANWRIGHT_REQUIRE_REVIEW: 'plan.outline.require_review',
  PLANWRIGHT_MAX_CONCURRENCY: 'plan.execute.max_concurrency',
  PLANWRIGHT_VERIFY_MAX_ITERATIONS: 'plan.verify.max_iterations',
  PLANWRIGHT_FIX_AT_OR_ABOVE: 'triage.fix_at_or_above',
  PLANWRIGHT_EXTENSION_TIMEOUT_MS: 'extensions.timeout_ms',
  PLANWRIGHT_STORAGE_BACKEND: 'storage.backend',
  PLANWRIGHT_STORAGE_ROOT: 'storage.root',
}

/**
 * Coerce a raw string (env var or CLI argument) to boolean/number where it looks like one.
 */
export function coerceScalar(rawValue: string): string | number | boolean {
  if (rawValue === 'true') return true
  if (rawValue === 'false') return false
  if (/^\d+$/.test(rawValue)) return parseInt(rawValue, 10)
  if (/^\d*\.\d+$/.test(rawValue)) return parseFloat(rawValue)
  return rawValue
}

/**
 * Read relevant environment variables and return a partial config overlay.
 */
function readEnvOverrides(env: NodeJS.ProcessEnv): PartialPlanwrightConfig {
  let overrides: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined) continue
    overrides = setByPath(overrides, configPath, coerceScalar(rawValue))
  }

  const parsed = PartialPlanwrightConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

function formatIssues(issues: ReadonlyArray<{ path: (string | number)[]; message: string }>): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: Readonly<PlanwrightConfig> | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialPlanwrightConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.planwright')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.planwright')
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    // 1. Start with built-in defaults
    let merged: Record<string, unknown> = deepClone(DEFAULT_CONFIG)

    // 2. Apply global user config if present
    const globalConfig = await this._loadYamlFile(join(this._globalConfigDir, 'config.yaml'))
    if (globalConfig !== null) merged = deepMerge(merged, globalConfig)

    // 3. Apply project config if present
    const projectConfig = await this._loadYamlFile(join(this._projectConfigDir, 'config.yaml'))
    if (projectConfig !== null) merged = deepMerge(merged, projectConfig)

    // 4. Apply environment variable overrides
    const envOverrides = readEnvOverrides(this._env)
    if (Object.keys(envOverrides).length > 0) merged = deepMerge(merged, envOverrides)

    // 5. Apply CLI flag overrides
    if (Object.keys(this._cliOverrides).length > 0) merged = deepMerge(merged, this._cliOverrides)

    // 6. Validate the merged config
    const result = PlanwrightConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }

    this._config = deepFreeze(result.data)
    logger.debug('Configuration loaded successfully')
  }

  getConfig(): Readonly<PlanwrightConfig> {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().', {})
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  async set(key: string, value: unknown): Promise<void> {
    const existing = getByPath(this.getConfig(), key)

    // The key must resolve to something in the merged config
    if (existing === undefined) {
      throw new ConfigError(`Unknown config key: ${key}`, { key })
    }

    // Whole sections and lists are edited in the config file, not through set()
    if (typeof existing === 'object' && existing !== null) {
      throw new ConfigError(`Cannot set object key "${key}"; use a more specific dot-notation path`, {
        key,
      })
    }

    const projectConfigPath = join(this._projectConfigDir, 'config.yaml')
    const projectConfigRaw: Record<string, unknown> =
      (await this._loadYamlFile(projectConfigPath)) ?? {}

    const updated = setByPath(projectConfigRaw, key, value)

    const partial = PartialPlanwrightConfigSchema.safeParse(updated)
    if (!partial.success) {
      throw new ConfigError(`Invalid value for "${key}":\n${formatIssues(partial.error.issues)}`, {
        key,
        value,
        issues: partial.error.issues,
      })
    }

    await mkdir(this._projectConfigDir, { recursive: true })
    await writeFile(projectConfigPath, yaml.dump(partial.data), 'utf-8')

    await this.load()
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialPlanwrightConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      parsed = yaml.load(await readFile(filePath, 'utf-8'))
    } catch (err) {
      throw new ConfigError(`Failed to read config file at ${filePath}: ${errorMessage(err)}`, {
        filePath,
      })
    }

    // An empty file is an empty overlay
    if (parsed === undefined || parsed === null) return {}

    const result = PartialPlanwrightConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
