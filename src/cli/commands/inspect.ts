import process from 'node:process'
import chalk from 'chalk'
import type {Command} from 'commander'
import {ImageBuilder} from '../../core/image-builder.js'
import {DockerCliExecutor} from '../../engine/docker-executor.js'
import {getGlobalOptions, loadProject} from '../utils.js'

export function registerInspectCommand(program: Command): void {
  program
    .command('inspect')
    .description('Compare the image with the current version pin and lock files')
    .option('--dependencies', 'List the locked production dependencies')
    .action(async (options: {dependencies?: boolean}, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const {dir, config, reporter} = await loadProject(cmd)
      const executor = new DockerCliExecutor()
      await executor.check()

      const status = await new ImageBuilder(executor, reporter).inspect(dir, config)

      if (json) {
        console.log(JSON.stringify(status, null, 2))
      } else {
        const label = {
          'up-to-date': chalk.green('up-to-date'),
          stale: chalk.yellow('stale'),
          missing: chalk.red('missing')
        }[status.status]

        console.log(chalk.bold(`\nImage: ${chalk.cyan(status.image)}`))
        console.log(`  Status:       ${label}`)
        console.log(`  Inputs:       ${status.fingerprint}`)
        if (status.recordedFingerprint) {
          console.log(`  Image inputs: ${status.recordedFingerprint}`)
        }

        if (status.python) {
          console.log(`  Python:       ${status.python}`)
        }

        console.log(`  Locked deps:  ${status.dependencies.length}`)
        if (options.dependencies) {
          for (const dependency of status.dependencies) {
            console.log(`    ${dependency.name}==${dependency.version}`)
          }
        }

        console.log()
      }

      if (status.status !== 'up-to-date') {
        process.exitCode = 1
      }
    })
}
