/**
 * Stable processing order for findings: source, then severity descending,
 * then file path. Line, rule, message and id break remaining ties so the
 * order depends on content only, never on input order.
 */

import { severityRank } from '../../core/types.js'
import type { Finding } from '../../persistence/schemas/plan-records.js'

function compareText(a: string | undefined, b: string | undefined): number {
  if (a === b) return 0
  // findings without a value sort after those with one
  if (a === undefined) return 1
  if (b === undefined) return -1
  return a < b ? -1 : 1
}

function compareNumber(a: number | undefined, b: number | undefined): number {
  if (a === b) return 0
  if (a === undefined) return 1
  if (b === undefined) return -1
  return a - b
}

export function compareFindings(a: Finding, b: Finding): number {
  return (
    compareText(a.source, b.source) ||
    severityRank(a.severity) - severityRank(b.severity) ||
    compareText(a.file, b.file) ||
    compareNumber(a.line, b.line) ||
    compareText(a.module, b.module) ||
    compareText(a.rule, b.rule) ||
    compareText(a.message, b.message) ||
    compareText(a.id, b.id)
  )
}

/** Sorted copy of the findings */
export function sortFindings(findings: readonly Finding[]): Finding[] {
  return [...findings].sort(compareFindings)
}

/** Coalescing key: the file, else the module, else the source */
export function fixTargetOf(finding: Finding): string {
  return finding.file ?? finding.module ?? finding.source
}
