/**
 * DefaultTriagePolicy: severity threshold policy used when no extension
 * decides a finding.
 *
 * FIX at or above the configured severity, ACCEPT below it. Never SUPPRESS:
 * suppression needs a domain-specific rationale the default cannot supply.
 */

import { severityRank, type Severity } from '../../core/types.js'
import type { Finding } from '../../persistence/schemas/plan-records.js'
import type { TriageResult } from '../extensions/types.js'
import type { TriagePolicy } from './types.js'

export class DefaultTriagePolicy implements TriagePolicy {
  readonly name = 'severity-threshold'
  private readonly _fixAtOrAbove: Severity

  constructor(fixAtOrAbove: Severity = 'major') {
    this._fixAtOrAbove = fixAtOrAbove
  }

  get fixAtOrAbove(): Severity {
    return this._fixAtOrAbove
  }

  decide(finding: Finding): TriageResult {
    if (severityRank(finding.severity) <= severityRank(this._fixAtOrAbove)) {
      return {
        decision: 'FIX',
        rationale: `severity ${finding.severity} is at or above ${this._fixAtOrAbove}`,
      }
    }
    return {
      decision: 'ACCEPT',
      rationale: `severity ${finding.severity} is below ${this._fixAtOrAbove}`,
    }
  }
}
