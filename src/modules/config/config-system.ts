/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { PlanwrightConfig, PartialPlanwrightConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/**
 * Options for initializing the config system.
 */
export interface ConfigSystemOptions {
  /** Path to the project-level .planwright/ directory (default: <cwd>/.planwright) */
  projectConfigDir?: string
  /** Path to the global user-level .planwright/ directory (default: ~/.planwright) */
  globalConfigDir?: string
  /**
   * Values that override every other source.
   * Typically populated from CLI flags.
   */
  cliOverrides?: PartialPlanwrightConfig
  /** Environment to read PLANWRIGHT_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated Planwright configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   */
  load(): Promise<void>

  /**
   * Return the fully-merged, validated configuration. The object is frozen.
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): Readonly<PlanwrightConfig>

  /**
   * Return a single value by dot-notation key (e.g. "plan.verify.max_iterations").
   * @returns the value, or undefined if the key does not exist.
   */
  get(key: string): unknown

  /**
   * Persist a single scalar value to the project config file and reload.
   * @throws {ConfigError} if the key is unknown, names a section, or the value is invalid.
   */
  set(key: string, value: unknown): Promise<void>

  /** Whether load() has been called and succeeded. */
  readonly isLoaded: boolean
}
