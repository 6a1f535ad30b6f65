#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import chalk from 'chalk'
import {Command} from 'commander'
import {exitCodeFor} from '../core/driver.js'
import {registerBuildCommand} from './commands/build.js'
import {registerCleanCommand} from './commands/clean.js'
import {registerListCommand} from './commands/list.js'
import {registerPlanCommand} from './commands/plan.js'
import {registerRunCommand} from './commands/run.js'
import {collect} from './utils.js'

async function main() {
  const program = new Command()

  program
    .name('rigger')
    .description('Incremental builds and test pipelines with ephemeral services')
    .version('0.1.0')
    .option('-p, --project <path>', 'Project file or directory', process.env.RIGGER_PROJECT ?? '.')
    .option('--json', 'Output structured JSON logs')
    .option('--env-file <path>', 'Load variables from a dotenv file for every command (repeatable)', collect, [])

  registerBuildCommand(program)
  registerPlanCommand(program)
  registerRunCommand(program)
  registerCleanCommand(program)
  registerListCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)))
  process.exitCode = exitCodeFor(error)
}
