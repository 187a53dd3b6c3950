/**
 * Built-in default values for the Planwright configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type { PlanwrightConfig, PlanSettings, TriageSettings } from './config-schema.js'

// ---------------------------------------------------------------------------
// Plan lifecycle defaults
// ---------------------------------------------------------------------------

export const DEFAULT_TASK_EXECUTORS: Record<string, string> = {
  implementation: 'task-implementation',
  module_testing: 'task-module_testing',
  integration_testing: 'task-integration_testing',
  verification: 'task-verification',
}

export const DEFAULT_PLAN_SETTINGS: PlanSettings = {
  refine: {
    confidence_threshold: 95,
    max_iterations: 3,
  },
  outline: {
    max_iterations: 3,
    require_review: true,
  },
  plan: {
    profiles: ['implementation', 'module_testing'],
  },
  execute: {
    max_concurrency: 1,
    task_executors: DEFAULT_TASK_EXECUTORS,
  },
  verify: {
    max_iterations: 5,
    checks: ['quality', 'build', 'domain-technical', 'test-coverage'],
  },
}

// ---------------------------------------------------------------------------
// Triage defaults
// ---------------------------------------------------------------------------

export const DEFAULT_TRIAGE_SETTINGS: TriageSettings = {
  fix_at_or_above: 'major',
  domain_routes: [],
}

// ---------------------------------------------------------------------------
// Complete default config
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: PlanwrightConfig = {
  config_format_version: '1',
  global: {
    log_level: 'info',
  },
  plan: DEFAULT_PLAN_SETTINGS,
  triage: DEFAULT_TRIAGE_SETTINGS,
  extensions: {
    timeout_ms: 120_000,
  },
  storage: {
    backend: 'file',
    root: '.planwright',
  },
}
