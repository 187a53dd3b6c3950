/**
 * `planwright status` command
 *
 * Shows where a plan stands: phase, derived status, loop counters, task and
 * finding totals, and the wait, failure or cancellation record.
 *
 * Usage:
 *   planwright status <planId>
 *   planwright status <planId> --output-format json
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error (unexpected exception)
 *   2 - Usage error (plan not found)
 */

import type { Command } from 'commander'
import { planStatus } from '../../modules/phase-orchestrator/phase-machine.js'
import { unresolvedFindingIds } from '../../modules/phase-orchestrator/finding-log.js'
import { formatPlanStatus } from '../formatters/plan-formatter.js'
import { writeJson } from '../utils/formatting.js'
import {
  EXIT_SUCCESS,
  parseOutputFormat,
  withPlanStore,
  type CommandContextOptions,
} from '../utils/command-context.js'

export interface StatusActionOptions extends CommandContextOptions {
  planId: string
}

export async function runStatusAction(options: StatusActionOptions): Promise<number> {
  const { planId, outputFormat, version = '0.0.0' } = options

  return withPlanStore(options, 'planwright status', async (store) => {
    const state = await store.load(planId)

    if (outputFormat === 'json') {
      const { plan, tasks } = state
      writeJson(
        'planwright status',
        {
          ...plan,
          status: planStatus(plan),
          deliverable_count: state.deliverables.length,
          task_count: tasks.length,
          tasks_done: tasks.filter((t) => t.status === 'done').length,
          finding_count: state.findings.length,
          unresolved_findings: unresolvedFindingIds(state.findings, tasks),
        },
        version,
      )
    } else {
      process.stdout.write(formatPlanStatus(state) + '\n')
    }
    return EXIT_SUCCESS
  })
}

export function registerStatusCommand(program: Command, version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('status <planId>')
    .description('Show the phase and progress of a plan')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (planId: string, opts: { outputFormat: string }) => {
      const exitCode = await runStatusAction({
        planId,
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
      process.exitCode = exitCode
    })
}
