/**
 * Plan artifact query functions for the SQLite persistence layer.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { PlanArtifact } from '../schemas/plan-records.js'

// ---------------------------------------------------------------------------
// Row type
// ---------------------------------------------------------------------------

export interface PlanArtifactRow {
  plan_id: string
  artifact: string
  document: string
  updated_at: string
}

// ---------------------------------------------------------------------------
// Query functions
// ---------------------------------------------------------------------------

/**
 * Insert or replace one artifact document of a plan.
 */
export function upsertArtifact(
  db: BetterSqlite3Database,
  planId: string,
  artifact: PlanArtifact,
  document: string,
): void {
  const stmt = db.prepare<[string, string, string]>(`
    INSERT INTO plan_artifacts (plan_id, artifact, document)
    VALUES (?, ?, ?)
    ON CONFLICT (plan_id, artifact)
    DO UPDATE SET document = excluded.document, updated_at = datetime('now')
  `)
  stmt.run(planId, artifact, document)
}

/**
 * All artifact rows of a plan (empty when the plan does not exist).
 */
export function getArtifacts(db: BetterSqlite3Database, planId: string): PlanArtifactRow[] {
  const stmt = db.prepare<[string], PlanArtifactRow>(
    'SELECT * FROM plan_artifacts WHERE plan_id = ? ORDER BY artifact',
  )
  return stmt.all(planId)
}

/**
 * One artifact row of a plan, if stored.
 */
export function getArtifact(
  db: BetterSqlite3Database,
  planId: string,
  artifact: PlanArtifact,
): PlanArtifactRow | undefined {
  const stmt = db.prepare<[string, string], PlanArtifactRow>(
    'SELECT * FROM plan_artifacts WHERE plan_id = ? AND artifact = ?',
  )
  return stmt.get(planId, artifact)
}

/**
 * Whether a plan record row exists for the id.
 */
export function planExists(db: BetterSqlite3Database, planId: string): boolean {
  const stmt = db.prepare<[string], { found: number }>(
    "SELECT 1 AS found FROM plan_artifacts WHERE plan_id = ? AND artifact = 'plan' LIMIT 1",
  )
  return stmt.get(planId) !== undefined
}

/**
 * Every stored plan record document, ordered by plan id.
 */
export function listPlanDocuments(db: BetterSqlite3Database): PlanArtifactRow[] {
  const stmt = db.prepare<[], PlanArtifactRow>(
    "SELECT * FROM plan_artifacts WHERE artifact = 'plan' ORDER BY plan_id",
  )
  return stmt.all()
}
