/**
 * `planwright list` command
 *
 * Lists every persisted plan with its phase and derived status.
 *
 * Usage:
 *   planwright list                       Table of plans
 *   planwright list --output-format json  JSON envelope with the plan records
 */

import type { Command } from 'commander'
import { planStatus } from '../../modules/phase-orchestrator/phase-machine.js'
import { formatPlanList } from '../formatters/plan-formatter.js'
import { writeJson } from '../utils/formatting.js'
import {
  EXIT_SUCCESS,
  parseOutputFormat,
  withPlanStore,
  type CommandContextOptions,
} from '../utils/command-context.js'

export type ListActionOptions = CommandContextOptions

export async function runListAction(options: ListActionOptions): Promise<number> {
  const { outputFormat, version = '0.0.0' } = options

  return withPlanStore(options, 'planwright list', async (store) => {
    const plans = await store.list()

    if (outputFormat === 'json') {
      writeJson(
        'planwright list',
        plans.map((p) => ({
          id: p.id,
          title: p.title,
          phase: p.phase,
          status: planStatus(p),
          created_at: p.created_at,
          updated_at: p.updated_at,
        })),
        version,
      )
    } else {
      process.stdout.write(formatPlanList(plans) + '\n')
    }
    return EXIT_SUCCESS
  })
}

export function registerListCommand(program: Command, version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('list')
    .description('List persisted plans')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { outputFormat: string }) => {
      const exitCode = await runListAction({
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
      process.exitCode = exitCode
    })
}
