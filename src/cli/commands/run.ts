import type {Command} from 'commander'
import {positiveInteger, positiveNumber, runSession} from '../utils.js'

type RunOptions = {
  concurrency?: number;
  timeout?: number;
  verbose?: boolean;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .alias('test')
    .description('Run a named pipeline: clean, build, services, then test suites')
    .argument('<pipeline>', 'Pipeline id from the project file')
    .option('-c, --concurrency <number>', 'Max targets of one level built at once (default: 1)', positiveInteger)
    .option('--timeout <seconds>', 'Abort the run after this many seconds', positiveNumber)
    .option('--verbose', 'Stream command output in real-time')
    .action(async (pipelineId: string, options: RunOptions, cmd: Command) => {
      await runSession(cmd, options, async (driver, ctx) => driver.run(pipelineId, ctx, {concurrency: options.concurrency}))
    })
}
