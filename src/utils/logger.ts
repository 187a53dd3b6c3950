/**
 * pino loggers for the orchestrator, the plan stores and the CLI.
 *
 * One logger per module (`createLogger('plan-store:file')`); per-plan work
 * logs through `childLogger(logger, { planId })` so every line of a plan
 * carries its id. The CLI runs without NODE_ENV and only shows warnings, so
 * its stdout stays machine-readable.
 */

import pino from 'pino'

export interface LoggerOptions {
  level?: string
  /** Overrides the module name in the `name` field */
  name?: string
  pretty?: boolean
}

/**
 * Keys masked on every line. Extension handlers are configured with the
 * credentials of the tools they call, and those objects end up in log context.
 */
export const REDACT_PATHS: string[] = ['apiKey', 'api_key', 'token', '*.apiKey', '*.api_key', '*.token']

type Env = NodeJS.ProcessEnv

function resolveLevel(env: Env): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL
  switch (env.NODE_ENV) {
    case 'production':
      return 'info'
    case 'development':
    case 'test':
      return 'debug'
    default:
      return 'warn'
  }
}

/** pino-pretty starts a worker thread, so it is opt-in outside development and tests */
function resolvePretty(env: Env): boolean {
  if (env.LOG_PRETTY !== undefined) return env.LOG_PRETTY === 'true'
  return env.NODE_ENV === 'development' || env.NODE_ENV === 'test'
}

const PRETTY_TRANSPORT = {
  target: 'pino-pretty',
  options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
}

export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const settings: pino.LoggerOptions = {
    name: options.name ?? name,
    level: options.level ?? resolveLevel(process.env),
    redact: REDACT_PATHS,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid },
  }

  const pretty = options.pretty ?? resolvePretty(process.env)
  return pretty ? pino({ ...settings, transport: PRETTY_TRANSPORT }) : pino(settings)
}

export const logger = createLogger('planwright')

export function childLogger(parent: pino.Logger, bindings: Record<string, unknown>): pino.Logger {
  return parent.child(bindings)
}
