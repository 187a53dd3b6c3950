/**
 * Plan store: public API
 */

import { resolve, join } from 'node:path'
import type { PlanwrightConfig } from '../config/config-schema.js'
import { FilePlanStore } from './file-plan-store.js'
import { SqlitePlanStore } from './sqlite-plan-store.js'
import type { PlanStore } from './plan-store.js'

export { FilePlanStore, createFilePlanStore, ARTIFACT_FILES, JOURNAL_FILE } from './file-plan-store.js'
export { SqlitePlanStore, createSqlitePlanStore } from './sqlite-plan-store.js'
export type { PlanStore } from './plan-store.js'
export type { PlanStateUpdate, FilePlanStoreOptions, SqlitePlanStoreOptions } from './types.js'

export const SQLITE_FILE = 'planwright.db'

/**
 * Create the store selected by `storage.backend`, rooted at `storage.root`
 * (resolved against `projectDir`).
 */
export function createPlanStore(storage: PlanwrightConfig['storage'], projectDir: string = process.cwd()): PlanStore {
  const root = resolve(projectDir, storage.root)
  switch (storage.backend) {
    case 'file':
      return new FilePlanStore({ root })
    case 'sqlite':
      return new SqlitePlanStore({ path: join(root, SQLITE_FILE) })
  }
}
