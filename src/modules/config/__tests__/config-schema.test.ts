/**
 * Unit tests for config-schema.ts
 *
 * Validates that:
 *  - PlanwrightConfigSchema accepts the built-in defaults
 *  - Range and enum violations are rejected
 *  - Unknown keys are rejected at every level
 *  - PartialPlanwrightConfigSchema accepts sparse overlays
 */

import { describe, it, expect } from 'vitest'
import {
  PlanwrightConfigSchema,
  PartialPlanwrightConfigSchema,
  DomainRouteSchema,
} from '../config-schema.js'
import type { PlanwrightConfig } from '../config-schema.js'
import { DEFAULT_CONFIG } from '../defaults.js'

function withPlan(plan: Partial<PlanwrightConfig['plan']>): PlanwrightConfig {
  return { ...DEFAULT_CONFIG, plan: { ...DEFAULT_CONFIG.plan, ...plan } }
}

// ---------------------------------------------------------------------------
// PlanwrightConfigSchema
// ---------------------------------------------------------------------------

describe('PlanwrightConfigSchema', () => {
  it('accepts the built-in defaults', () => {
    expect(PlanwrightConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true)
  })

  it('rejects a confidence threshold above 100', () => {
    const config = withPlan({ refine: { confidence_threshold: 101, max_iterations: 3 } })
    const result = PlanwrightConfigSchema.safeParse(config)
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['plan', 'refine', 'confidence_threshold'])
    }
  })

  it('rejects a negative iteration ceiling', () => {
    const config = withPlan({ verify: { max_iterations: -1, checks: [] } })
    expect(PlanwrightConfigSchema.safeParse(config).success).toBe(false)
  })

  it('accepts a zero iteration ceiling', () => {
    const config = withPlan({ outline: { max_iterations: 0, require_review: false } })
    expect(PlanwrightConfigSchema.safeParse(config).success).toBe(true)
  })

  it('rejects an empty profile order', () => {
    expect(PlanwrightConfigSchema.safeParse(withPlan({ plan: { profiles: [] } })).success).toBe(false)
  })

  it('rejects an unknown severity threshold', () => {
    const config = { ...DEFAULT_CONFIG, triage: { fix_at_or_above: 'urgent', domain_routes: [] } }
    expect(PlanwrightConfigSchema.safeParse(config).success).toBe(false)
  })

  it('rejects an unknown storage backend', () => {
    const config = { ...DEFAULT_CONFIG, storage: { backend: 'postgres', root: '.planwright' } }
    expect(PlanwrightConfigSchema.safeParse(config).success).toBe(false)
  })

  it('rejects unknown top-level and nested keys', () => {
    expect(PlanwrightConfigSchema.safeParse({ ...DEFAULT_CONFIG, extra: 1 }).success).toBe(false)
    const nested = { ...DEFAULT_CONFIG, extensions: { timeout_ms: 1000, retries: 3 } }
    expect(PlanwrightConfigSchema.safeParse(nested).success).toBe(false)
  })

  it('requires config_format_version 1', () => {
    expect(PlanwrightConfigSchema.safeParse({ ...DEFAULT_CONFIG, config_format_version: '2' }).success).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// DomainRouteSchema
// ---------------------------------------------------------------------------

describe('DomainRouteSchema', () => {
  it('needs a non-empty pattern and domain', () => {
    expect(DomainRouteSchema.safeParse({ pattern: '.java', domain: 'java' }).success).toBe(true)
    expect(DomainRouteSchema.safeParse({ pattern: '', domain: 'java' }).success).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// PartialPlanwrightConfigSchema
// ---------------------------------------------------------------------------

describe('PartialPlanwrightConfigSchema', () => {
  it('accepts an empty overlay', () => {
    expect(PartialPlanwrightConfigSchema.safeParse({}).success).toBe(true)
  })

  it('accepts a single nested value', () => {
    const result = PartialPlanwrightConfigSchema.safeParse({ plan: { verify: { max_iterations: 2 } } })
    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.data).toEqual({ plan: { verify: { max_iterations: 2 } } })
    }
  })

  it('still validates the values it carries', () => {
    expect(PartialPlanwrightConfigSchema.safeParse({ extensions: { timeout_ms: 0 } }).success).toBe(false)
  })

  it('rejects an unknown plan section', () => {
    expect(PartialPlanwrightConfigSchema.safeParse({ plan: { review: {} } }).success).toBe(false)
  })
})
