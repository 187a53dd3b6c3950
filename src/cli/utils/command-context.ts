/**
 * Shared plumbing for commands that read persisted plans: exit codes,
 * configuration loading, store lifetime and error reporting.
 */

import { join } from 'node:path'
import {
  ConfigError,
  PlanNotFoundError,
  PlanStateError,
  ValidationError,
} from '../../core/errors.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import { createPlanStore } from '../../modules/plan-store/index.js'
import type { PlanStore } from '../../modules/plan-store/plan-store.js'
import { createLogger } from '../../utils/logger.js'
import { errorMessage } from '../../utils/helpers.js'

const logger = createLogger('cli')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const EXIT_SUCCESS = 0
export const EXIT_ERROR = 1
export const EXIT_USAGE_ERROR = 2

export type OutputFormat = 'human' | 'json'

export function parseOutputFormat(raw: string): OutputFormat {
  return raw === 'json' ? 'json' : 'human'
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface CommandContextOptions {
  projectRoot: string
  outputFormat: OutputFormat
  version?: string
  /** Global config directory (default ~/.planwright) */
  globalConfigDir?: string
}

/** Config system for the project at `projectRoot` */
export function projectConfigSystem(options: Pick<CommandContextOptions, 'projectRoot' | 'globalConfigDir'>): ConfigSystem {
  return createConfigSystem({
    projectConfigDir: join(options.projectRoot, '.planwright'),
    ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }),
  })
}

// ---------------------------------------------------------------------------
// Error reporting
// ---------------------------------------------------------------------------

/**
 * Report a command failure on stderr and map it to an exit code: unknown
 * plans and invalid requests are usage errors, anything else is an error.
 */
export function reportCommandError(err: unknown, command: string): number {
  const message = errorMessage(err)
  process.stderr.write(`Error: ${message}\n`)

  if (
    err instanceof PlanNotFoundError ||
    err instanceof PlanStateError ||
    err instanceof ValidationError ||
    err instanceof ConfigError
  ) {
    return EXIT_USAGE_ERROR
  }
  logger.error({ err, command }, 'Command failed')
  return EXIT_ERROR
}

// ---------------------------------------------------------------------------
// withPlanStore
// ---------------------------------------------------------------------------

/**
 * Load configuration, open the configured plan store, run `action` and close
 * the store again. Errors thrown by `action` are reported and mapped to an
 * exit code.
 */
export async function withPlanStore(
  options: CommandContextOptions,
  command: string,
  action: (store: PlanStore) => Promise<number>,
): Promise<number> {
  let store: PlanStore | undefined
  try {
    const system = projectConfigSystem(options)
    await system.load()
    store = createPlanStore(system.getConfig().storage, options.projectRoot)
    return await action(store)
  } catch (err) {
    return reportCommandError(err, command)
  } finally {
    await store?.close()
  }
}
