/**
 * TriagePipelineImpl
 *
 * Per finding: resolve the triage handler for the finding's domain. No
 * handler → default policy (`decided_by: default`). A SUPPRESS without a
 * rationale, or a result that is not a valid decision, is rejected and
 * re-routed to the default policy (`default-after-rejection`). A handler that
 * fails after its local retry yields FIX (`handler-failure`), so the defect is
 * not lost.
 *
 * FIX decisions are grouped by file (else module) in processing order; each
 * group becomes one fix-task.
 */

import { z } from 'zod'
import type pino from 'pino'
import { createLogger, childLogger } from '../../utils/logger.js'
import { TRIAGE_DECISIONS } from '../../core/types.js'
import type { Finding, Task, TriageRecord } from '../../persistence/schemas/plan-records.js'
import type { ExtensionRegistry } from '../extensions/extension-registry.js'
import type { TriageResult } from '../extensions/types.js'
import { invokeExternal } from '../extensions/external-call.js'
import { createFixTask } from '../task-model/task-tracker.js'
import type { FixGroup } from '../task-model/types.js'
import { sortFindings, fixTargetOf } from './ordering.js'
import type { TriagePipeline } from './triage-pipeline.js'
import type {
  TriageFallbackListener,
  TriagePolicy,
  TriageRunOptions,
  TriageRunResult,
  TriagedFinding,
} from './types.js'

const logger = createLogger('triage')

const TriageResultSchema = z.object({
  decision: z.enum(TRIAGE_DECISIONS),
  rationale: z.string().optional(),
})

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface TriagePipelineOptions {
  registry: ExtensionRegistry
  policy: TriagePolicy
  /** Wall-clock limit per handler call */
  timeoutMs: number
}

// ---------------------------------------------------------------------------
// TriagePipelineImpl
// ---------------------------------------------------------------------------

export class TriagePipelineImpl implements TriagePipeline {
  private readonly _registry: ExtensionRegistry
  private readonly _policy: TriagePolicy
  private readonly _timeoutMs: number

  constructor(options: TriagePipelineOptions) {
    this._registry = options.registry
    this._policy = options.policy
    this._timeoutMs = options.timeoutMs
  }

  defaultDecision(finding: Finding): TriageResult {
    return this._policy.decide(finding)
  }

  async run(findings: readonly Finding[], options: TriageRunOptions): Promise<TriageRunResult> {
    const log = childLogger(logger, { planId: options.planId, verifyIteration: options.verifyIteration })
    const pending = sortFindings(findings.filter((f) => f.state === 'new'))
    const records = new Map<string, { record: TriageRecord; domain: string }>()
    const fallbackDomains = new Set<string>()

    for (const finding of pending) {
      const domain = options.resolveDomain(finding)
      const record = await this._decide(finding, domain, log, fallbackDomains, options.onFallback)
      records.set(finding.id, { record, domain })
    }

    // Coalesce FIX decisions by target, groups in processing order
    const groups = new Map<string, FixGroup>()
    for (const finding of pending) {
      const entry = records.get(finding.id)
      if (entry?.record.decision !== 'FIX') continue
      const target = fixTargetOf(finding)
      const group = groups.get(target) ?? { target, domain: entry.domain, findings: [] }
      group.findings.push(finding)
      groups.set(target, group)
    }

    const fixTasks: Task[] = []
    const fixTaskOf = new Map<string, number>()
    let number = options.startTaskNumber
    for (const group of groups.values()) {
      const executor = await options.fixExecutorFor(group.domain)
      const task = createFixTask(group.findings, {
        number: number++,
        domain: group.domain,
        executor,
        verifyIteration: options.verifyIteration,
        now: options.now,
      })
      fixTasks.push(task)
      for (const f of group.findings) fixTaskOf.set(f.id, task.number)
    }

    const decisions: TriagedFinding[] = pending.map((finding) => {
      const entry = records.get(finding.id)
      const decided: TriagedFinding = {
        findingId: finding.id,
        domain: entry?.domain ?? 'generic',
        decision: entry?.record.decision ?? 'FIX',
        decidedBy: entry?.record.decided_by ?? 'default',
      }
      const fixTask = fixTaskOf.get(finding.id)
      if (fixTask !== undefined) decided.fixTask = fixTask
      return decided
    })

    const updated = findings.map((finding): Finding => {
      const entry = records.get(finding.id)
      if (finding.state !== 'new' || entry === undefined) return finding
      const next: Finding = { ...finding, triage: entry.record }
      switch (entry.record.decision) {
        case 'FIX': {
          next.state = 'fix-task-created'
          const fixTask = fixTaskOf.get(finding.id)
          if (fixTask !== undefined) next.fix_task = fixTask
          break
        }
        case 'SUPPRESS':
          next.state = 'suppressed'
          break
        case 'ACCEPT':
          next.state = 'accepted'
          break
      }
      return next
    })

    log.info(
      {
        triaged: pending.length,
        fix: decisions.filter((d) => d.decision === 'FIX').length,
        fixTasks: fixTasks.length,
      },
      'Findings triaged',
    )

    return { findings: updated, fixTasks, decisions }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _decide(
    finding: Finding,
    domain: string,
    log: pino.Logger,
    fallbackDomains: Set<string>,
    onFallback: TriageFallbackListener | undefined,
  ): Promise<TriageRecord> {
    const triager = this._registry.tryResolve(domain, 'triage')
    if (triager === undefined) {
      if (!fallbackDomains.has(domain)) {
        fallbackDomains.add(domain)
        log.info({ domain, capability: 'triage', policy: this._policy.name }, 'No triage extension; applying default policy')
        onFallback?.(domain)
      }
      return this._fromPolicy(finding, 'default')
    }

    const result = await invokeExternal(`triage:${domain}`, () => triager.triage(finding), {
      timeoutMs: this._timeoutMs,
      logger: log,
    })
    if (!result.ok) {
      log.warn({ findingId: finding.id, domain, err: result.error.message }, 'Triage handler failed; finding kept as FIX')
      return { decision: 'FIX', rationale: result.error.message, decided_by: 'handler-failure' }
    }

    const parsed = TriageResultSchema.safeParse(result.value)
    if (!parsed.success) {
      return this._reject(finding, `invalid triage result from '${domain}'`, log)
    }

    const { decision, rationale } = parsed.data
    if (decision === 'SUPPRESS' && (rationale === undefined || rationale.trim() === '')) {
      return this._reject(finding, 'SUPPRESS requires a rationale', log)
    }

    const record: TriageRecord = { decision, decided_by: 'extension' }
    if (rationale !== undefined) record.rationale = rationale
    return record
  }

  private _reject(finding: Finding, reason: string, log: pino.Logger): TriageRecord {
    log.warn({ findingId: finding.id, reason }, 'Triage decision rejected; applying default policy')
    return { ...this._fromPolicy(finding, 'default-after-rejection'), rejected: reason }
  }

  private _fromPolicy(finding: Finding, decidedBy: 'default' | 'default-after-rejection'): TriageRecord {
    const result = this._policy.decide(finding)
    const record: TriageRecord = { decision: result.decision, decided_by: decidedBy }
    if (result.rationale !== undefined) record.rationale = result.rationale
    return record
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createTriagePipeline(options: TriagePipelineOptions): TriagePipeline {
  return new TriagePipelineImpl(options)
}
