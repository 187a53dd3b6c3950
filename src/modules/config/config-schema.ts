/**
 * Zod validation schemas for the Planwright configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings
 *  - plan lifecycle (per-phase thresholds and iteration ceilings)
 *  - triage defaults and domain routes
 *  - extension call limits
 *  - storage backend
 *  - full config document
 */

import { z } from 'zod'
import { SEVERITIES } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Plan lifecycle settings
// ---------------------------------------------------------------------------

/** Ceiling on loop-backs for a loop-eligible phase */
const MaxIterationsSchema = z.number().int().min(0).max(100)

export const RefineSettingsSchema = z
  .object({
    /** Minimum confidence (0-100) required to leave 2-refine */
    confidence_threshold: z.number().min(0).max(100),
    max_iterations: MaxIterationsSchema,
  })
  .strict()

export const OutlineSettingsSchema = z
  .object({
    max_iterations: MaxIterationsSchema,
    /** Suspend for a review decision before 4-plan */
    require_review: z.boolean(),
  })
  .strict()

export const PlanningSettingsSchema = z
  .object({
    /** Order in which a deliverable's profiles expand into tasks */
    profiles: z.array(z.string().min(1)).min(1),
  })
  .strict()

export const ExecuteSettingsSchema = z
  .object({
    /** Tasks run concurrently in 5-execute (1 = sequential) */
    max_concurrency: z.number().int().min(1).max(32),
    /** Default executor ref per task profile */
    task_executors: z.record(z.string(), z.string().min(1)),
  })
  .strict()

export const VerifySettingsSchema = z
  .object({
    max_iterations: MaxIterationsSchema,
    /** Check categories the verifier reports on */
    checks: z.array(z.string().min(1)),
  })
  .strict()

export const PlanSettingsSchema = z
  .object({
    refine: RefineSettingsSchema,
    outline: OutlineSettingsSchema,
    plan: PlanningSettingsSchema,
    execute: ExecuteSettingsSchema,
    verify: VerifySettingsSchema,
  })
  .strict()

export type PlanSettings = z.infer<typeof PlanSettingsSchema>

// ---------------------------------------------------------------------------
// Triage settings
// ---------------------------------------------------------------------------

export const SeveritySchema = z.enum(SEVERITIES)

/** Maps a file path suffix (e.g. ".java", "src/web/") to a domain */
export const DomainRouteSchema = z
  .object({
    pattern: z.string().min(1),
    domain: z.string().min(1),
  })
  .strict()

export type DomainRoute = z.infer<typeof DomainRouteSchema>

export const TriageSettingsSchema = z
  .object({
    /** Default policy fixes findings at or above this severity */
    fix_at_or_above: SeveritySchema,
    domain_routes: z.array(DomainRouteSchema),
  })
  .strict()

export type TriageSettings = z.infer<typeof TriageSettingsSchema>

// ---------------------------------------------------------------------------
// Extension and storage settings
// ---------------------------------------------------------------------------

export const ExtensionSettingsSchema = z
  .object({
    /** Wall-clock limit for a single external call */
    timeout_ms: z.number().int().positive(),
  })
  .strict()

export const StorageBackendSchema = z.enum(['file', 'sqlite'])
export type StorageBackend = z.infer<typeof StorageBackendSchema>

export const StorageSettingsSchema = z
  .object({
    backend: StorageBackendSchema,
    /** Directory holding plan artifacts, relative to the project root */
    root: z.string().min(1),
  })
  .strict()

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

export const PlanwrightConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    plan: PlanSettingsSchema,
    triage: TriageSettingsSchema,
    extensions: ExtensionSettingsSchema,
    storage: StorageSettingsSchema,
  })
  .strict()

export type PlanwrightConfig = z.infer<typeof PlanwrightConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (config files, env overlay and CLI overrides)
// ---------------------------------------------------------------------------

export const PartialPlanwrightConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    plan: z
      .object({
        refine: RefineSettingsSchema.partial().optional(),
        outline: OutlineSettingsSchema.partial().optional(),
        plan: PlanningSettingsSchema.partial().optional(),
        execute: ExecuteSettingsSchema.partial().optional(),
        verify: VerifySettingsSchema.partial().optional(),
      })
      .strict()
      .optional(),
    triage: TriageSettingsSchema.partial().optional(),
    extensions: ExtensionSettingsSchema.partial().optional(),
    storage: StorageSettingsSchema.partial().optional(),
  })
  .strict()

export type PartialPlanwrightConfig = z.infer<typeof PartialPlanwrightConfigSchema>
