import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import type {
  CommandFailedEvent,
  Reporter,
  RunEvent,
  ServiceStateEvent,
  TargetFailedEvent,
  UnitRef
} from '../core/reporter.js'
import {formatDuration} from '../core/utils.js'

type FailedEvent = TargetFailedEvent | CommandFailedEvent

/**
 * Reporter with interactive terminal UI using spinners and colors.
 * Suitable for local development and manual execution.
 */
export class InteractiveReporter implements Reporter {
  private static get maxStderrLines() {
    return 20
  }

  private readonly verbose: boolean
  private readonly spinners = new Map<string, Ora>()
  private readonly stderrBuffers = new Map<string, string[]>()

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: RunEvent): void {
    switch (event.event) {
      case 'RUN_START': {
        const label = event.label ? chalk.gray(` @ ${event.label}`) : ''
        console.log(chalk.bold(`\n▶ Pipeline: ${chalk.cyan(event.pipelineName)}${label}\n`))
        break
      }

      case 'STAGE_START': {
        console.log(chalk.bold.gray(`  ${event.stage}`))
        break
      }

      case 'TARGET_STARTING': {
        this.start(`target:${event.target.id}`, event.target.displayName)
        break
      }

      case 'COMMAND_STARTING': {
        this.start(`command:${event.command.id}`, event.command.displayName)
        break
      }

      case 'TARGET_SKIPPED': {
        this.persist(`target:${event.target.id}`, chalk.gray('⊙'), chalk.gray(`${event.target.displayName} (fresh)`))
        break
      }

      case 'TARGET_WOULD_RUN': {
        this.persist(`target:${event.target.id}`, chalk.yellow('○'), chalk.yellow(`${event.target.displayName} (would run)`))
        break
      }

      case 'TARGET_FINISHED': {
        this.finish(`target:${event.target.id}`, event.target, event.durationMs)
        break
      }

      case 'COMMAND_FINISHED': {
        this.finish(`command:${event.command.id}`, event.command, event.durationMs)
        break
      }

      case 'TARGET_FAILED':
      case 'COMMAND_FAILED': {
        this.handleFailed(event)
        break
      }

      case 'SERVICE_STATE': {
        this.handleServiceState(event)
        break
      }

      case 'SERVICE_PROBE': {
        const spinner = this.spinners.get(`service:${event.service.id}`)
        if (spinner && !event.ready) {
          spinner.text = `${event.service.displayName} (waiting, attempt ${event.attempt})`
        }

        break
      }

      case 'SERVICE_TEARDOWN_FAILED': {
        console.log(`  ${chalk.yellow('⚠')} ${chalk.yellow(event.message)}`)
        break
      }

      case 'LOG': {
        this.handleLog(event.source, event.stream, event.line)
        break
      }

      case 'RUN_FINISHED': {
        console.log(chalk.bold.green(`\n✓ Pipeline completed (${formatDuration(event.durationMs)})\n`))
        break
      }

      case 'RUN_FAILED': {
        for (const spinner of this.spinners.values()) {
          spinner.stop()
        }

        this.spinners.clear()
        const where = event.stage ? ` during ${event.stage}` : ''
        console.log(chalk.bold.red(`\n✗ Pipeline failed${where}: ${event.message}\n`))
        break
      }

      default: {
        break
      }
    }
  }

  private start(key: string, text: string): void {
    this.spinners.set(key, ora({text, prefixText: '  '}).start())
  }

  private persist(key: string, symbol: string, text: string): void {
    const spinner = this.spinners.get(key)
    if (spinner) {
      spinner.stopAndPersist({symbol, text})
      this.spinners.delete(key)
    } else {
      console.log(`  ${symbol} ${text}`)
    }
  }

  private finish(key: string, unit: UnitRef, durationMs: number): void {
    this.persist(key, chalk.green('✓'), chalk.green(`${unit.displayName} (${formatDuration(durationMs)})`))
    this.stderrBuffers.delete(unit.id)
  }

  private handleFailed(event: FailedEvent): void {
    const unit = event.event === 'TARGET_FAILED' ? event.target : event.command
    const key = event.event === 'TARGET_FAILED' ? `target:${unit.id}` : `command:${unit.id}`
    const detail = event.exitCode === 0 ? 'missing output' : `exit ${event.exitCode}`
    this.persist(key, chalk.red('✗'), chalk.red(`${unit.displayName} (${detail})`))
    if (event.error) {
      console.log(chalk.red(`  ${event.error}`))
    }

    const stderr = this.stderrBuffers.get(unit.id)
    if (stderr && stderr.length > 0) {
      console.log(chalk.red('  ── stderr ──'))
      for (const line of stderr) {
        console.log(chalk.red(`  ${line}`))
      }
    }

    this.stderrBuffers.delete(unit.id)
  }

  private handleServiceState(event: ServiceStateEvent): void {
    const key = `service:${event.service.id}`
    const name = event.service.displayName

    switch (event.state) {
      case 'STARTING': {
        this.start(key, `${name} (starting ${chalk.gray(event.containerName)})`)
        break
      }

      case 'READY': {
        this.persist(key, chalk.green('✓'), chalk.green(`${name} ready`))
        break
      }

      case 'FAILED_TO_START': {
        this.persist(key, chalk.red('✗'), chalk.red(`${name} failed to start`))
        break
      }

      case 'STOPPED': {
        console.log(`  ${chalk.gray('■')} ${chalk.gray(`${name} stopped`)}`)
        break
      }

      default: {
        break
      }
    }
  }

  private handleLog(source: UnitRef, stream: 'stdout' | 'stderr', line: string): void {
    if (this.verbose) {
      const spinner = [...this.spinners.entries()].find(([key]) => key.endsWith(`:${source.id}`))?.[1]
      const prefix = chalk.gray(`  [${source.id}]`)
      if (spinner) {
        spinner.clear()
        console.log(`${prefix} ${line}`)
        spinner.render()
      } else {
        console.log(`${prefix} ${line}`)
      }
    }

    if (stream === 'stderr') {
      let buffer = this.stderrBuffers.get(source.id)
      if (!buffer) {
        buffer = []
        this.stderrBuffers.set(source.id, buffer)
      }

      buffer.push(line)
      if (buffer.length > InteractiveReporter.maxStderrLines) {
        buffer.shift()
      }
    }
  }
}
