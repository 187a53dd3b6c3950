/**
 * PlanSession: working copy of one plan for the duration of a locked
 * orchestrator operation.
 *
 * Phase logic mutates `state` freely; `commit()` writes only the artifacts
 * that changed since the last commit, in one atomic store commit, and then
 * publishes the events queued since. Subscribers therefore only observe
 * persisted state.
 *
 * Commits are conditional on the revision the session last saw. If another
 * process committed the plan in the meantime the store throws
 * PlanConflictError and the queued events are dropped with the work.
 */

import type pino from 'pino'
import type { TypedEventBus, PlanEventName } from '../../core/event-bus.js'
import type { PlanEvents } from '../../core/event-bus.types.js'
import { PLAN_ARTIFACTS } from '../../persistence/schemas/plan-records.js'
import type { PlanArtifact, PlanState } from '../../persistence/schemas/plan-records.js'
import { deepClone } from '../../utils/helpers.js'
import type { PlanStore } from '../plan-store/plan-store.js'
import type { PlanStateUpdate } from '../plan-store/types.js'

function copyArtifact<K extends PlanArtifact>(target: PlanStateUpdate, source: PlanState, artifact: K): void {
  target[artifact] = source[artifact]
}

export class PlanSession {
  readonly planId: string
  readonly now: string
  readonly log: pino.Logger
  state: PlanState

  private readonly _baseline = new Map<PlanArtifact, string>()
  private readonly _bus: TypedEventBus | undefined
  private _pending: Array<() => void> = []
  /** `${domain}:${capability}` pairs already reported as fallbacks */
  private readonly _fallbacks = new Set<string>()

  constructor(state: PlanState, options: { now: string; log: pino.Logger; bus?: TypedEventBus }) {
    this.planId = state.plan.id
    this.now = options.now
    this.log = options.log
    this._bus = options.bus
    this.state = deepClone(state)
    this._snapshotBaseline()
  }

  /** Queue an event for publication after the next commit */
  emit<K extends PlanEventName>(event: K, payload: PlanEvents[K]): void {
    const bus = this._bus
    if (bus !== undefined) this._pending.push(() => bus.emit(event, payload))
  }

  /** True the first time a (domain, capability) fallback is seen in this session */
  firstFallback(domain: string, capability: string): boolean {
    const key = `${domain}:${capability}`
    if (this._fallbacks.has(key)) return false
    this._fallbacks.add(key)
    return true
  }

  /** Artifacts that differ from the last committed state */
  changes(): PlanStateUpdate {
    const update: PlanStateUpdate = {}
    for (const artifact of PLAN_ARTIFACTS) {
      if (JSON.stringify(this.state[artifact]) !== this._baseline.get(artifact)) {
        copyArtifact(update, this.state, artifact)
      }
    }
    return update
  }

  /** Persist changed artifacts atomically, then publish queued events */
  async commit(store: PlanStore): Promise<void> {
    const update = this.changes()
    if (Object.keys(update).length > 0) {
      const revision = await store.commit(this.planId, update, { expectedRevision: this.state.plan.revision })
      this.state.plan = { ...this.state.plan, revision }
      this._snapshotBaseline()
    }
    const pending = this._pending
    this._pending = []
    for (const publish of pending) publish()
  }

  private _snapshotBaseline(): void {
    for (const artifact of PLAN_ARTIFACTS) {
      this._baseline.set(artifact, JSON.stringify(this.state[artifact]))
    }
  }
}
