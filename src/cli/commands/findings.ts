/**
 * `planwright findings` command
 *
 * Prints the findings log of a plan. `--unresolved` limits the output to
 * findings that are still open (new, or waiting on an unfinished fix-task).
 */

import type { Command } from 'commander'
import { unresolvedFindingIds } from '../../modules/phase-orchestrator/finding-log.js'
import { formatFindingTable } from '../formatters/plan-formatter.js'
import { writeJson } from '../utils/formatting.js'
import {
  EXIT_SUCCESS,
  parseOutputFormat,
  withPlanStore,
  type CommandContextOptions,
} from '../utils/command-context.js'

export interface FindingsActionOptions extends CommandContextOptions {
  planId: string
  unresolved?: boolean
}

export async function runFindingsAction(options: FindingsActionOptions): Promise<number> {
  const { planId, outputFormat, unresolved = false, version = '0.0.0' } = options

  return withPlanStore(options, 'planwright findings', async (store) => {
    const state = await store.load(planId)
    let findings = state.findings
    if (unresolved) {
      const open = new Set(unresolvedFindingIds(state.findings, state.tasks))
      findings = findings.filter((f) => open.has(f.id))
    }

    if (outputFormat === 'json') {
      writeJson('planwright findings', findings, version)
    } else {
      process.stdout.write(formatFindingTable(findings) + '\n')
    }
    return EXIT_SUCCESS
  })
}

export function registerFindingsCommand(program: Command, version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('findings <planId>')
    .description('List the findings recorded for a plan')
    .option('--unresolved', 'Only show findings that are still open')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (planId: string, opts: { outputFormat: string; unresolved?: boolean }) => {
      process.exitCode = await runFindingsAction({
        planId,
        unresolved: opts.unresolved === true,
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
    })
}
