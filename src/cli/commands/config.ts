/**
 * `planwright config` command group
 *
 * Subcommands:
 *   show                 Print the merged configuration (YAML, or JSON envelope)
 *   get <key>            Print one value by dot-notation key
 *   set <key> <value>    Persist a scalar value to the project config file
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { coerceScalar } from '../../modules/config/config-system-impl.js'
import { writeJson } from '../utils/formatting.js'
import {
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  parseOutputFormat,
  projectConfigSystem,
  reportCommandError,
  type CommandContextOptions,
} from '../utils/command-context.js'

// ---------------------------------------------------------------------------
// show
// ---------------------------------------------------------------------------

export async function runConfigShow(options: CommandContextOptions): Promise<number> {
  const { outputFormat, version = '0.0.0' } = options
  try {
    const system = projectConfigSystem(options)
    await system.load()
    const config = system.getConfig()

    if (outputFormat === 'json') {
      writeJson('planwright config show', config, version)
    } else {
      process.stdout.write(yaml.dump(config))
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportCommandError(err, 'planwright config show')
  }
}

// ---------------------------------------------------------------------------
// get
// ---------------------------------------------------------------------------

export async function runConfigGet(options: CommandContextOptions & { key: string }): Promise<number> {
  const { key, outputFormat, version = '0.0.0' } = options
  try {
    const system = projectConfigSystem(options)
    await system.load()
    const value = system.get(key)

    if (value === undefined) {
      process.stderr.write(`Error: Unknown config key: ${key}\n`)
      return EXIT_USAGE_ERROR
    }

    if (outputFormat === 'json') {
      writeJson('planwright config get', { key, value }, version)
    } else if (typeof value === 'object' && value !== null) {
      process.stdout.write(yaml.dump(value))
    } else {
      process.stdout.write(`${String(value)}\n`)
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportCommandError(err, 'planwright config get')
  }
}

// ---------------------------------------------------------------------------
// set
// ---------------------------------------------------------------------------

export async function runConfigSet(
  options: CommandContextOptions & { key: string; value: string },
): Promise<number> {
  const { key, outputFormat, version = '0.0.0' } = options
  try {
    const system = projectConfigSystem(options)
    await system.load()
    const value = coerceScalar(options.value)
    await system.set(key, value)

    if (outputFormat === 'json') {
      writeJson('planwright config set', { key, value }, version)
    } else {
      process.stdout.write(`Set ${key} = ${String(value)}\n`)
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportCommandError(err, 'planwright config set')
  }
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

export function registerConfigCommand(program: Command, version = '0.0.0', projectRoot = process.cwd()): void {
  const configCmd = program
    .command('config')
    .description('Show and modify Planwright configuration')

  configCmd
    .command('show')
    .description('Show the merged configuration')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--global-config-dir <dir>', 'Path to the global .planwright/ directory')
    .action(async (opts: { outputFormat: string; globalConfigDir?: string }) => {
      process.exitCode = await runConfigShow({
        projectRoot,
        version,
        outputFormat: parseOutputFormat(opts.outputFormat),
        ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
      })
    })

  configCmd
    .command('get <key>')
    .description('Show one configuration value (dot-notation key)')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--global-config-dir <dir>', 'Path to the global .planwright/ directory')
    .action(async (key: string, opts: { outputFormat: string; globalConfigDir?: string }) => {
      process.exitCode = await runConfigGet({
        key,
        projectRoot,
        version,
        outputFormat: parseOutputFormat(opts.outputFormat),
        ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
      })
    })

  configCmd
    .command('set <key> <value>')
    .description('Set a scalar configuration value in the project config file')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--global-config-dir <dir>', 'Path to the global .planwright/ directory')
    .action(async (key: string, value: string, opts: { outputFormat: string; globalConfigDir?: string }) => {
      process.exitCode = await runConfigSet({
        key,
        value,
        projectRoot,
        version,
        outputFormat: parseOutputFormat(opts.outputFormat),
        ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
      })
    })
}
