/**
 * Migration 001: plan artifacts.
 *
 * One row per (plan, artifact). Each document is stored as JSON text so a
 * commit can replace any subset of a plan's artifacts in one transaction.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const migration001PlanArtifacts: Migration = {
  version: 1,
  name: '001-plan-artifacts',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS plan_artifacts (
        plan_id    TEXT NOT NULL,
        artifact   TEXT NOT NULL CHECK (artifact IN ('plan', 'intake', 'deliverables', 'tasks', 'findings')),
        document   TEXT NOT NULL,
        updated_at TEXT NOT NULL DEFAULT (datetime('now')),
        PRIMARY KEY (plan_id, artifact)
      );

      CREATE INDEX IF NOT EXISTS idx_plan_artifacts_artifact ON plan_artifacts(artifact);
    `)
  },
}
