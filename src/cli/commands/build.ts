import type {Command} from 'commander'
import {positiveInteger, positiveNumber, runSession} from '../utils.js'

type BuildOptions = {
  concurrency?: number;
  timeout?: number;
  verbose?: boolean;
}

export function registerBuildCommand(program: Command): void {
  program
    .command('build')
    .description('Build targets whose outputs are out of date')
    .argument('[targets...]', 'Targets to build with their dependencies (default: every leaf target)')
    .option('-c, --concurrency <number>', 'Max targets of one level built at once (default: 1)', positiveInteger)
    .option('--timeout <seconds>', 'Abort the build after this many seconds', positiveNumber)
    .option('--verbose', 'Stream command output in real-time')
    .action(async (targets: string[], options: BuildOptions, cmd: Command) => {
      await runSession(cmd, options, async (driver, ctx) => driver.build(
        targets.length > 0 ? targets : undefined,
        ctx,
        {concurrency: options.concurrency}
      ))
    })
}
