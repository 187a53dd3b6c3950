/**
 * `planwright cancel` command
 *
 * Cancels a plan that has not reached a terminal phase. The plan record moves
 * to `cancelled` and keeps the phase it was in together with the reason.
 *
 * The commit is conditional on the revision just loaded. An orchestrator
 * driving the plan in another process notices the new revision on its next
 * commit and stops; if it commits first, the cancel reloads and tries again.
 *
 * Usage:
 *   planwright cancel <planId>
 *   planwright cancel <planId> --reason "superseded"
 *   planwright cancel <planId> --output-format json
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error (unexpected exception)
 *   2 - Usage error (plan not found, plan already terminal)
 */

import type { Command } from 'commander'
import { PlanConflictError } from '../../core/errors.js'
import { cancelPlanRecord } from '../../modules/phase-orchestrator/phase-machine.js'
import type { PlanStore } from '../../modules/plan-store/plan-store.js'
import type { PlanRecord } from '../../persistence/schemas/plan-records.js'
import { createLogger } from '../../utils/logger.js'
import { writeJson } from '../utils/formatting.js'
import {
  EXIT_SUCCESS,
  parseOutputFormat,
  withPlanStore,
  type CommandContextOptions,
} from '../utils/command-context.js'

const logger = createLogger('cancel-cmd')

const CANCEL_ATTEMPTS = 3

export interface CancelActionOptions extends CommandContextOptions {
  planId: string
  reason?: string
}

export async function runCancelAction(options: CancelActionOptions): Promise<number> {
  const { planId, outputFormat, reason = '', version = '0.0.0' } = options

  return withPlanStore(options, 'planwright cancel', async (store) => {
    const { plan, cancelled } = await cancelStored(store, planId, reason)
    logger.info({ planId, phase: plan.phase }, 'Plan cancelled')

    if (outputFormat === 'json') {
      writeJson(
        'planwright cancel',
        { planId, previousPhase: plan.phase, phase: cancelled.phase, reason: cancelled.cancellation?.reason },
        version,
      )
    } else {
      process.stdout.write(`Plan ${planId} cancelled (was in ${plan.phase}).\n`)
    }
    return EXIT_SUCCESS
  })
}

async function cancelStored(
  store: PlanStore,
  planId: string,
  reason: string,
): Promise<{ plan: PlanRecord; cancelled: PlanRecord }> {
  for (let attempt = 1; ; attempt++) {
    const { plan } = await store.load(planId)
    const cancelled = cancelPlanRecord(plan, reason, new Date().toISOString())
    try {
      await store.commit(planId, { plan: cancelled }, { expectedRevision: plan.revision })
      return { plan, cancelled }
    } catch (err) {
      if (!(err instanceof PlanConflictError) || attempt >= CANCEL_ATTEMPTS) throw err
      logger.debug({ planId, attempt }, 'Plan changed while cancelling; retrying')
    }
  }
}

export function registerCancelCommand(program: Command, version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('cancel <planId>')
    .description('Cancel a plan that has not finished')
    .option('--reason <text>', 'Why the plan is cancelled')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (planId: string, opts: { outputFormat: string; reason?: string }) => {
      const exitCode = await runCancelAction({
        planId,
        ...(opts.reason !== undefined && { reason: opts.reason }),
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot,
        version,
      })
      process.exitCode = exitCode
    })
}
