/**
 * SqlitePlanStore: plan artifacts as JSON documents in SQLite.
 *
 * Every create/commit runs in a single better-sqlite3 transaction, so the
 * artifacts of one commit become visible together or not at all. Commits
 * take the write lock up front (`BEGIN IMMEDIATE`) so the revision check and
 * the writes see the same stored plan.
 */

import { mkdirSync } from 'node:fs'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { dirname } from 'node:path'
import { PlanNotFoundError, PlanStoreError } from '../../core/errors.js'
import { DatabaseWrapper } from '../../persistence/database.js'
import {
  getArtifact,
  getArtifacts,
  listPlanDocuments,
  planExists,
  upsertArtifact,
} from '../../persistence/queries/plan-artifacts.js'
import type { PlanArtifactRow } from '../../persistence/queries/plan-artifacts.js'
import { PLAN_ARTIFACTS, PlanRecordSchema } from '../../persistence/schemas/plan-records.js'
import type { PlanArtifact, PlanRecord, PlanState } from '../../persistence/schemas/plan-records.js'
import { createLogger } from '../../utils/logger.js'
import { errorMessage } from '../../utils/helpers.js'
import {
  decodePlanRecord,
  decodePlanState,
  encodeArtifacts,
  isValidPlanId,
  prepareCommit,
  sortPlanRecords,
} from './artifact-codec.js'
import type { PlanStore } from './plan-store.js'
import type { CommitOptions, PlanStateUpdate, SqlitePlanStoreOptions } from './types.js'

const logger = createLogger('plan-store:sqlite')

function parseDocument(row: PlanArtifactRow): unknown {
  try {
    const document: unknown = JSON.parse(row.document)
    return document
  } catch (err) {
    throw new PlanStoreError(`Unreadable ${row.artifact} document for plan '${row.plan_id}': ${errorMessage(err)}`, {
      planId: row.plan_id,
      artifact: row.artifact,
    })
  }
}

function isPlanArtifact(name: string): name is PlanArtifact {
  return PLAN_ARTIFACTS.some((artifact) => artifact === name)
}

// ---------------------------------------------------------------------------
// SqlitePlanStore
// ---------------------------------------------------------------------------

export class SqlitePlanStore implements PlanStore {
  readonly backend = 'sqlite' as const
  private readonly _path: string
  private readonly _wrapper: DatabaseWrapper

  constructor(options: SqlitePlanStoreOptions) {
    this._path = options.path
    this._wrapper = new DatabaseWrapper(options.path)
  }

  async create(state: PlanState): Promise<void> {
    const planId = state.plan.id
    const encoded = encodeArtifacts(planId, state)
    const db = this._open()

    db.transaction(() => {
      if (planExists(db, planId)) {
        throw new PlanStoreError(`Plan already exists: ${planId}`, { planId })
      }
      for (const entry of encoded) {
        upsertArtifact(db, planId, entry.artifact, JSON.stringify(entry.document))
      }
    })()
    logger.debug({ planId }, 'Plan created')
  }

  async load(planId: string): Promise<PlanState> {
    const db = this._open()
    const rows = getArtifacts(db, planId)
    if (!rows.some((row) => row.artifact === 'plan')) {
      throw new PlanNotFoundError(planId)
    }

    const documents: Partial<Record<PlanArtifact, unknown>> = {}
    for (const row of rows) {
      if (isPlanArtifact(row.artifact)) documents[row.artifact] = parseDocument(row)
    }
    return decodePlanState(planId, documents)
  }

  async commit(planId: string, update: PlanStateUpdate, options: CommitOptions = {}): Promise<number> {
    const db = this._open()

    const { encoded, revision } = db
      .transaction(() => {
        const row = getArtifact(db, planId, 'plan')
        if (row === undefined) throw new PlanNotFoundError(planId)
        const prepared = prepareCommit(planId, decodePlanRecord(planId, parseDocument(row)), update, options)
        for (const entry of prepared.encoded) {
          upsertArtifact(db, planId, entry.artifact, JSON.stringify(entry.document))
        }
        return prepared
      })
      .immediate()
    logger.debug({ planId, revision, artifacts: encoded.map((e) => e.artifact) }, 'Plan artifacts committed')
    return revision
  }

  async exists(planId: string): Promise<boolean> {
    return isValidPlanId(planId) && planExists(this._open(), planId)
  }

  async list(): Promise<PlanRecord[]> {
    const records: PlanRecord[] = []
    for (const row of listPlanDocuments(this._open())) {
      const parsed = PlanRecordSchema.safeParse(parseDocument(row))
      if (!parsed.success) {
        logger.warn({ planId: row.plan_id }, 'Skipping plan with an invalid plan record')
        continue
      }
      records.push(parsed.data)
    }
    return sortPlanRecords(records)
  }

  async close(): Promise<void> {
    this._wrapper.close()
  }

  private _open(): BetterSqlite3Database {
    if (!this._wrapper.isOpen) {
      if (this._path !== ':memory:') mkdirSync(dirname(this._path), { recursive: true })
      this._wrapper.open()
    }
    return this._wrapper.db
  }
}

export function createSqlitePlanStore(options: SqlitePlanStoreOptions): SqlitePlanStore {
  return new SqlitePlanStore(options)
}
