import type {Command} from 'commander'
import {runSession} from '../utils.js'

export function registerPlanCommand(program: Command): void {
  program
    .command('plan')
    .description('Show which targets would be rebuilt, without running anything')
    .argument('[targets...]', 'Targets to check with their dependencies (default: every leaf target)')
    .action(async (targets: string[], _options: Record<string, unknown>, cmd: Command) => {
      await runSession(cmd, {}, async (driver, ctx) => driver.build(
        targets.length > 0 ? targets : undefined,
        ctx,
        {dryRun: true}
      ))
    })
}
