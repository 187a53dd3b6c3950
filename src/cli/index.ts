#!/usr/bin/env node
/**
 * Planwright CLI - Main entry point
 * Provides the `planwright` command-line interface for inspecting and
 * administering persisted plans.
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { existsSync, realpathSync } from 'fs'
import { readFile } from 'fs/promises'
import { createLogger } from '../utils/logger.js'
import { registerListCommand } from './commands/list.js'
import { registerStatusCommand } from './commands/status.js'
import { registerTasksCommand } from './commands/tasks.js'
import { registerFindingsCommand } from './commands/findings.js'
import { registerCancelCommand } from './commands/cancel.js'
import { registerConfigCommand } from './commands/config.js'

const logger = createLogger('cli')

/** Resolve the package version from the nearest package.json above this file */
export async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  // src/cli/ and dist/cli/ both sit two levels below the package root
  const pkgPath = resolve(here, '../../package.json')
  if (!existsSync(pkgPath)) return '0.0.0'

  const pkg: unknown = JSON.parse(await readFile(pkgPath, 'utf-8'))
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(projectRoot: string = process.cwd()): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('planwright')
    .description('Planwright - plan lifecycle orchestration')
    .version(version, '-v, --version', 'Output the current version')

  registerListCommand(program, version, projectRoot)
  registerStatusCommand(program, version, projectRoot)
  registerTasksCommand(program, version, projectRoot)
  registerFindingsCommand(program, version, projectRoot)
  registerCancelCommand(program, version, projectRoot)
  registerConfigCommand(program, version, projectRoot)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Run only when executed directly, not when imported by tests
if (process.argv[1] !== undefined && realpathSync(process.argv[1]) === fileURLToPath(import.meta.url)) {
  void main()
}
