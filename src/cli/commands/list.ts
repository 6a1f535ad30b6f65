import chalk from 'chalk'
import type {Command} from 'commander'
import {getGlobalOptions, loadProject} from '../utils.js'

type Row = {kind: string; id: string; detail: string}

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List targets, services, suites and pipelines of the project')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const project = await loadProject(cmd)

      if (json) {
        console.log(JSON.stringify({
          id: project.id,
          targets: project.targets.map(t => t.id),
          services: project.services.map(s => s.id),
          suites: project.suites.map(s => s.id),
          pipelines: project.pipelines.map(p => p.id)
        }))
        return
      }

      const rows: Row[] = [
        ...project.targets.map(t => ({kind: 'target', id: t.id, detail: t.outputs.length > 0 ? t.outputs.join(', ') : '(always)'})),
        ...project.services.map(s => ({kind: 'service', id: s.id, detail: s.image})),
        ...project.suites.map(s => ({kind: 'suite', id: s.id, detail: s.cmd.join(' ')})),
        ...project.pipelines.map(p => ({kind: 'pipeline', id: p.id, detail: [...p.build, ...p.services, ...p.suites].join(', ')}))
      ]

      if (rows.length === 0) {
        console.log(chalk.gray('Nothing declared in this project.'))
        return
      }

      const kindWidth = Math.max('KIND'.length, ...rows.map(r => r.kind.length))
      const idWidth = Math.max('ID'.length, ...rows.map(r => r.id.length))
      console.log(chalk.bold(`${'KIND'.padEnd(kindWidth)}  ${'ID'.padEnd(idWidth)}  DETAIL`))
      for (const row of rows) {
        console.log(`${row.kind.padEnd(kindWidth)}  ${row.id.padEnd(idWidth)}  ${chalk.gray(row.detail)}`)
      }
    })
}
