/**
 * FilePlanStore: human-diffable YAML artifacts with journaled commits.
 *
 * Layout: `<root>/plans/<planId>/{plan,request,deliverables,tasks,findings}.yaml`
 *
 * Commit protocol:
 *   1. write every artifact to `<file>.tmp`
 *   2. write `commit.journal.tmp` listing the files, rename it to
 *      `commit.journal` (the commit point)
 *   3. rename each `.tmp` over its artifact
 *   4. remove the journal
 *
 * Every access to a plan directory holds `commit.lock`, created exclusively,
 * so processes sharing a root never see or clean up each other's commits in
 * flight. A lock older than `staleLockMs` is left over from a crash and is
 * taken over.
 *
 * Recovery (under the lock, before every read or write): a journal present
 * means the commit point was reached, so the remaining renames are rolled
 * forward. Any `.tmp` left without a journal belongs to a commit that never
 * reached its commit point and is discarded.
 */

import { mkdir, open, readdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import yaml from 'js-yaml'
import { z } from 'zod'
import { PlanNotFoundError, PlanStoreError } from '../../core/errors.js'
import { PLAN_ARTIFACTS, PlanRecordSchema } from '../../persistence/schemas/plan-records.js'
import type { PlanArtifact, PlanRecord, PlanState } from '../../persistence/schemas/plan-records.js'
import { createLogger } from '../../utils/logger.js'
import { errorMessage, sleep } from '../../utils/helpers.js'
import {
  decodePlanRecord,
  decodePlanState,
  encodeArtifacts,
  isValidPlanId,
  prepareCommit,
  sortPlanRecords,
} from './artifact-codec.js'
import type { EncodedArtifact } from './artifact-codec.js'
import type { PlanStore } from './plan-store.js'
import type { CommitOptions, FilePlanStoreOptions, PlanStateUpdate } from './types.js'

const logger = createLogger('plan-store:file')

export const ARTIFACT_FILES: Readonly<Record<PlanArtifact, string>> = {
  plan: 'plan.yaml',
  intake: 'request.yaml',
  deliverables: 'deliverables.yaml',
  tasks: 'tasks.yaml',
  findings: 'findings.yaml',
}

export const JOURNAL_FILE = 'commit.journal'
export const LOCK_FILE = 'commit.lock'
const TMP_SUFFIX = '.tmp'

const DEFAULT_LOCK_TIMEOUT_MS = 10_000
const DEFAULT_STALE_LOCK_MS = 30_000
const LOCK_POLL_MS = 20

const KNOWN_FILES: readonly string[] = Object.values(ARTIFACT_FILES)

const JournalSchema = z.object({
  files: z.array(z.string().refine((file) => KNOWN_FILES.includes(file), 'not a plan artifact file')),
})

function isErrnoError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code
}

function dumpYaml(document: unknown): string {
  return yaml.dump(document, { schema: yaml.JSON_SCHEMA, skipInvalid: true, noRefs: true, lineWidth: 120 })
}

function parseYaml(text: string, file: string): unknown {
  try {
    return yaml.load(text, { schema: yaml.JSON_SCHEMA, filename: file })
  } catch (err) {
    throw new PlanStoreError(`Unreadable artifact ${file}: ${errorMessage(err)}`, { file })
  }
}

async function readOptional(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf-8')
  } catch (err) {
    if (isErrnoError(err, 'ENOENT')) return undefined
    throw err
  }
}

// ---------------------------------------------------------------------------
// FilePlanStore
// ---------------------------------------------------------------------------

export class FilePlanStore implements PlanStore {
  readonly backend = 'file' as const
  private readonly _plansDir: string
  private readonly _lockTimeoutMs: number
  private readonly _staleLockMs: number

  constructor(options: FilePlanStoreOptions) {
    this._plansDir = join(options.root, 'plans')
    this._lockTimeoutMs = options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS
    this._staleLockMs = options.staleLockMs ?? DEFAULT_STALE_LOCK_MS
  }

  async create(state: PlanState): Promise<void> {
    const planId = state.plan.id
    const encoded = encodeArtifacts(planId, state)
    const dir = this._planDir(planId)

    await mkdir(dir, { recursive: true })
    await this._locked(dir, async () => {
      if ((await readOptional(join(dir, ARTIFACT_FILES.plan))) !== undefined) {
        throw new PlanStoreError(`Plan already exists: ${planId}`, { planId })
      }
      await this._writeAtomically(dir, encoded)
    })
    logger.debug({ planId }, 'Plan created')
  }

  async load(planId: string): Promise<PlanState> {
    const dir = this._planDir(planId)
    const documents = await this._locked(dir, async () => {
      const read: Partial<Record<PlanArtifact, unknown>> = {}
      for (const artifact of PLAN_ARTIFACTS) {
        const file = ARTIFACT_FILES[artifact]
        const text = await readOptional(join(dir, file))
        if (text === undefined) {
          if (artifact === 'plan') throw new PlanNotFoundError(planId)
          continue
        }
        read[artifact] = parseYaml(text, file)
      }
      return read
    })
    return decodePlanState(planId, documents)
  }

  async commit(planId: string, update: PlanStateUpdate, options: CommitOptions = {}): Promise<number> {
    const dir = this._planDir(planId)
    const { encoded, revision } = await this._locked(dir, async () => {
      const text = await readOptional(join(dir, ARTIFACT_FILES.plan))
      if (text === undefined) throw new PlanNotFoundError(planId)
      const stored = decodePlanRecord(planId, parseYaml(text, ARTIFACT_FILES.plan))
      const prepared = prepareCommit(planId, stored, update, options)
      await this._writeAtomically(dir, prepared.encoded)
      return prepared
    })
    logger.debug({ planId, revision, artifacts: encoded.map((e) => e.artifact) }, 'Plan artifacts committed')
    return revision
  }

  async exists(planId: string): Promise<boolean> {
    if (!isValidPlanId(planId)) return false
    const dir = join(this._plansDir, planId)
    return this._locked(dir, async () => (await readOptional(join(dir, ARTIFACT_FILES.plan))) !== undefined)
  }

  async list(): Promise<PlanRecord[]> {
    let entries: string[]
    try {
      entries = await readdir(this._plansDir)
    } catch (err) {
      if (isErrnoError(err, 'ENOENT')) return []
      throw err
    }

    const records: PlanRecord[] = []
    for (const planId of entries.filter(isValidPlanId)) {
      const dir = join(this._plansDir, planId)
      const text = await this._locked(dir, () => readOptional(join(dir, ARTIFACT_FILES.plan)))
      if (text === undefined) continue
      const parsed = PlanRecordSchema.safeParse(parseYaml(text, ARTIFACT_FILES.plan))
      if (!parsed.success) {
        logger.warn({ planId }, 'Skipping plan with an invalid plan record')
        continue
      }
      records.push(parsed.data)
    }
    return sortPlanRecords(records)
  }

  async close(): Promise<void> {
    // Nothing held open between calls
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _planDir(planId: string): string {
    if (!isValidPlanId(planId)) throw new PlanNotFoundError(planId)
    return join(this._plansDir, planId)
  }

  /**
   * Run `action` holding the plan directory's commit lock, after recovering
   * any interrupted commit. A directory that does not exist has nothing to
   * guard, so `action` runs without the lock.
   */
  private async _locked<T>(dir: string, action: () => Promise<T>): Promise<T> {
    const lockPath = join(dir, LOCK_FILE)
    const deadline = Date.now() + this._lockTimeoutMs

    for (;;) {
      try {
        const handle = await open(lockPath, 'wx')
        try {
          await handle.writeFile(String(process.pid), 'utf-8')
        } finally {
          await handle.close()
        }
        break
      } catch (err) {
        if (isErrnoError(err, 'ENOENT')) return action()
        if (!isErrnoError(err, 'EEXIST')) throw err
      }

      if (await this._clearStaleLock(lockPath)) continue
      if (Date.now() >= deadline) {
        throw new PlanStoreError(`Timed out waiting for the commit lock in ${dir}`, { dir, lock: lockPath })
      }
      await sleep(LOCK_POLL_MS)
    }

    try {
      await this._recover(dir)
      return await action()
    } finally {
      await rm(lockPath, { force: true })
    }
  }

  /** Remove a lock left behind by a crashed process; true when the lock is gone */
  private async _clearStaleLock(lockPath: string): Promise<boolean> {
    let mtimeMs: number
    try {
      mtimeMs = (await stat(lockPath)).mtimeMs
    } catch (err) {
      if (isErrnoError(err, 'ENOENT')) return true
      throw err
    }
    if (Date.now() - mtimeMs < this._staleLockMs) return false

    logger.warn({ lock: lockPath }, 'Taking over stale commit lock')
    await rm(lockPath, { force: true })
    return true
  }

  private async _writeAtomically(dir: string, encoded: EncodedArtifact[]): Promise<void> {
    const files: string[] = []
    for (const entry of encoded) {
      const file = ARTIFACT_FILES[entry.artifact]
      await writeFile(join(dir, `${file}${TMP_SUFFIX}`), dumpYaml(entry.document), 'utf-8')
      files.push(file)
    }

    const journalTmp = join(dir, `${JOURNAL_FILE}${TMP_SUFFIX}`)
    await writeFile(journalTmp, dumpYaml({ files }), 'utf-8')
    await rename(journalTmp, join(dir, JOURNAL_FILE))

    await this._rollForward(dir, files, { recovering: false })
  }

  /**
   * Rename every journaled `.tmp` over its artifact, then drop the journal.
   * When recovering, a missing `.tmp` was already renamed by the interrupted
   * roll-forward; in a live commit it means the write was lost.
   */
  private async _rollForward(dir: string, files: readonly string[], options: { recovering: boolean }): Promise<void> {
    for (const file of files) {
      try {
        await rename(join(dir, `${file}${TMP_SUFFIX}`), join(dir, file))
      } catch (err) {
        if (!isErrnoError(err, 'ENOENT')) throw err
        if (!options.recovering) {
          throw new PlanStoreError(`Uncommitted write of ${file} disappeared before its rename`, { dir, file })
        }
      }
    }
    await rm(join(dir, JOURNAL_FILE), { force: true })
  }

  private async _recover(dir: string): Promise<void> {
    const journalText = await readOptional(join(dir, JOURNAL_FILE))
    if (journalText !== undefined) {
      const journal = JournalSchema.safeParse(parseYaml(journalText, JOURNAL_FILE))
      if (!journal.success) {
        throw new PlanStoreError(`Corrupt commit journal in ${dir}`, { dir })
      }
      logger.warn({ dir, files: journal.data.files }, 'Rolling forward interrupted commit')
      await this._rollForward(dir, journal.data.files, { recovering: true })
    }

    const entries = await readdir(dir)
    const stray = entries.filter((name) => name.endsWith(TMP_SUFFIX))
    if (stray.length > 0) {
      logger.warn({ dir, files: stray }, 'Discarding uncommitted artifact writes')
      for (const name of stray) await rm(join(dir, name), { force: true })
    }
  }
}

export function createFilePlanStore(options: FilePlanStoreOptions): FilePlanStore {
  return new FilePlanStore(options)
}
