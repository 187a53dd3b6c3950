/**
 * `planwright tasks` command
 *
 * Prints the task list of a plan in execution order.
 */

import type { Command } from 'commander'
import { formatTaskTable } from '../formatters/plan-formatter.js'
import { writeJson } from '../utils/formatting.js'
import {
  EXIT_SUCCESS,
  parseOutputFormat,
  withPlanStore,
  type CommandContextOptions,
} from '../utils/command-context.js'

export interface TasksActionOptions extends CommandContextOptions {
  planId: string
}

export async function runTasksAction(options: TasksActionOptions): Promise<number> {
  const { planId, outputFormat, version = '0.0.0' } = options

  return withPlanStore(options, 'planwright tasks', async (store) => {
    const { tasks } = await store.load(planId)

    if (outputFormat === 'json') {
      writeJson('planwright tasks', tasks, version)
    } else {
      process.stdout.write(formatTaskTable(tasks) + '\n')
      for (const task of tasks.filter((t) => t.blocked_reason !== undefined)) {
        process.stdout.write(`TASK-${String(task.number)} blocked: ${task.blocked_reason ?? ''}\n`)
      }
    }
    return EXIT_SUCCESS
  })
}

export function registerTasksCommand(program: Command, version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('tasks <planId>')
    .description('List the tasks of a plan')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (planId: string, opts: { outputFormat: string }) => {
      process.exitCode = await runTasksAction({
        planId,
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
    })
}
