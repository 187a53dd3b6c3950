/**
 * Validation shared by the plan store backends.
 */

import type { ZodError } from 'zod'
import { PlanConflictError, PlanStoreError } from '../../core/errors.js'
import {
  ARTIFACT_SCHEMAS,
  PLAN_ARTIFACTS,
  PlanIdSchema,
  PlanRecordSchema,
  PlanStateSchema,
} from '../../persistence/schemas/plan-records.js'
import type { PlanArtifact, PlanRecord, PlanState } from '../../persistence/schemas/plan-records.js'
import type { CommitOptions, PlanStateUpdate } from './types.js'

export interface EncodedArtifact {
  artifact: PlanArtifact
  /** Validated document, stripped of unknown keys */
  document: unknown
}

function formatIssues(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ')
}

export function isValidPlanId(planId: string): boolean {
  return PlanIdSchema.safeParse(planId).success
}

/**
 * Validate the artifacts present in `update`, in canonical artifact order.
 * @throws {PlanStoreError} on the first artifact that does not validate
 */
export function encodeArtifacts(planId: string, update: PlanStateUpdate): EncodedArtifact[] {
  const encoded: EncodedArtifact[] = []
  for (const artifact of PLAN_ARTIFACTS) {
    const value = update[artifact]
    if (value === undefined) continue
    const result = ARTIFACT_SCHEMAS[artifact].safeParse(value)
    if (!result.success) {
      throw new PlanStoreError(`Refusing to store invalid ${artifact} for plan '${planId}': ${formatIssues(result.error)}`, {
        planId,
        artifact,
      })
    }
    encoded.push({ artifact, document: result.data })
  }
  return encoded
}

/**
 * Artifacts to write for a commit on top of the stored plan record. The plan
 * record always goes out, carrying the next revision.
 * @throws {PlanConflictError} when `expectedRevision` is not the stored revision
 */
export function prepareCommit(
  planId: string,
  stored: PlanRecord,
  update: PlanStateUpdate,
  options: CommitOptions,
): { encoded: EncodedArtifact[]; revision: number } {
  const expected = options.expectedRevision
  if (expected !== undefined && expected !== stored.revision) {
    throw new PlanConflictError(planId, expected, stored.revision)
  }
  const revision = stored.revision + 1
  const plan = { ...(update.plan ?? stored), revision }
  return { encoded: encodeArtifacts(planId, { ...update, plan }), revision }
}

/**
 * Validate a stored plan record document.
 * @throws {PlanStoreError} when it does not validate
 */
export function decodePlanRecord(planId: string, document: unknown): PlanRecord {
  const result = PlanRecordSchema.safeParse(document)
  if (!result.success) {
    throw new PlanStoreError(`Stored plan record of '${planId}' is invalid: ${formatIssues(result.error)}`, { planId })
  }
  return result.data
}

/**
 * Assemble and validate a full plan state from stored documents.
 * @throws {PlanStoreError} when an artifact is missing or invalid
 */
export function decodePlanState(planId: string, documents: Partial<Record<PlanArtifact, unknown>>): PlanState {
  const missing = PLAN_ARTIFACTS.filter((a) => documents[a] === undefined)
  if (missing.length > 0) {
    throw new PlanStoreError(`Plan '${planId}' is missing artifacts: ${missing.join(', ')}`, { planId, missing })
  }
  const result = PlanStateSchema.safeParse(documents)
  if (!result.success) {
    throw new PlanStoreError(`Stored state of plan '${planId}' is invalid: ${formatIssues(result.error)}`, { planId })
  }
  return result.data
}

/** Oldest first; ties broken by id */
export function sortPlanRecords(records: PlanRecord[]): PlanRecord[] {
  return [...records].sort((a, b) =>
    a.created_at === b.created_at ? a.id.localeCompare(b.id) : a.created_at.localeCompare(b.created_at),
  )
}
