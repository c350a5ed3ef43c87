import chalk from 'chalk'
import type {Command} from 'commander'
import {DockerCliExecutor} from '../../engine/docker-executor.js'

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Check that the Docker CLI is available')
    .action(async () => {
      await new DockerCliExecutor().check()
      console.log(chalk.green('Docker CLI available'))
    })
}
