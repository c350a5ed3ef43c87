import process from 'node:process'
import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import type {DevcellEvent, IdentityResolvedEvent, Reporter} from '../core/reporter.js'
import {shellJoin} from '../core/shell.js'
import {renderOwnershipOperation} from '../identity/ownership.js'
import {formatDuration} from '../core/utils.js'

/**
 * Reporter with interactive terminal UI using a spinner and colors.
 * Writes to stderr; stdout belongs to the container once it starts.
 */
export class InteractiveReporter implements Reporter {
  private static get maxOutputLines() {
    return 20
  }

  private readonly verbose: boolean
  private spinner?: Ora
  private readonly output: string[] = []

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: DevcellEvent): void {
    switch (event.event) {
      case 'BUILD_START': {
        console.error(chalk.bold(`\n▶ Image: ${chalk.cyan(event.image)} ${chalk.gray(`(python ${event.python})`)}\n`))
        this.spinner = ora({text: event.stages.join(' → '), prefixText: ' ', stream: process.stderr}).start()
        break
      }

      case 'BUILD_RENDERED': {
        console.error(`  ${chalk.yellow('○')} ${chalk.yellow(`Build context for ${event.image} written (not built)`)}`)
        console.error(chalk.gray(`    ${event.dockerfile}`))
        console.error(chalk.gray(`    ${event.entrypoint}`))
        break
      }

      case 'BUILD_FINISHED': {
        const text = `${event.image} built (${event.dependencies} locked dependencies, ${formatDuration(event.durationMs)})`
        this.stopSpinner(chalk.green('✓'), chalk.green(text))
        console.error(chalk.gray(`  inputs ${event.fingerprint.slice(0, 12)}\n`))
        this.output.length = 0
        break
      }

      case 'BUILD_FAILED': {
        this.stopSpinner(chalk.red('✗'), chalk.red(`${event.image} build failed${event.exitCode === undefined ? '' : ` (exit ${event.exitCode})`}`))
        if (this.output.length > 0) {
          console.error(chalk.red('  ── build output ──'))
          for (const line of this.output) {
            console.error(chalk.red(`  ${line}`))
          }
        }

        this.output.length = 0
        break
      }

      case 'IDENTITY_RESOLVED': {
        this.printIdentity(event)
        break
      }

      case 'RUN_STARTING': {
        const command = event.cmd ? shellJoin(event.cmd) : 'default command'
        console.error(chalk.bold(`\n▶ ${chalk.cyan(event.image)} ${chalk.gray(`(${command})`)}`))
        for (const mount of event.mounts) {
          console.error(chalk.gray(`  ${mount.hostPath} → ${mount.containerPath}`))
        }

        console.error()
        break
      }

      case 'RUN_FINISHED': {
        const symbol = event.exitCode === 0 ? chalk.green('✓') : chalk.red('✗')
        const text = `${event.container} exited with ${event.exitCode} after ${formatDuration(event.durationMs)}`
        console.error(`\n${symbol} ${event.exitCode === 0 ? chalk.green(text) : chalk.red(text)}`)
        break
      }

      case 'WARNING': {
        if (this.spinner) {
          this.spinner.clear()
        }

        console.error(chalk.yellow(`⚠ ${event.message}`))
        this.spinner?.render()
        break
      }
    }
  }

  log(_image: string, _stream: 'stdout' | 'stderr', line: string): void {
    if (this.verbose) {
      if (this.spinner) {
        this.spinner.clear()
        console.error(chalk.gray(`  ${line}`))
        this.spinner.render()
      } else {
        console.error(chalk.gray(`  ${line}`))
      }
    }

    this.output.push(line)
    if (this.output.length > InteractiveReporter.maxOutputLines) {
      this.output.shift()
    }
  }

  private printIdentity(event: IdentityResolvedEvent): void {
    const ids = `${event.uid}:${event.gid}`
    if (event.status === 'unchanged') {
      console.error(chalk.gray(`  ${event.account} already runs as ${ids}`))
      return
    }

    for (const change of event.changes) {
      const subject = change.kind === 'group-id' ? `group ${change.group}` : `user ${change.user}`
      console.error(chalk.gray(`  ${subject}: ${change.from} → ${change.to}`))
    }

    for (const command of event.ownership.flatMap(operation => renderOwnershipOperation(operation))) {
      console.error(chalk.gray(`    ${command}`))
    }
  }

  private stopSpinner(symbol: string, text: string): void {
    if (this.spinner) {
      this.spinner.stopAndPersist({symbol, text})
      this.spinner = undefined
    } else {
      console.error(`  ${symbol} ${text}`)
    }
  }
}
