import type {Command} from 'commander'
import {runSession} from '../utils.js'

export function registerCleanCommand(program: Command): void {
  program
    .command('clean')
    .description('Remove the clean paths declared by the project')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      await runSession(cmd, {}, async (driver, ctx) => driver.clean(ctx))
    })
}
