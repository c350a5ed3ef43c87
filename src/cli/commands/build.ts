import type {Command} from 'commander'
import {ImageBuilder} from '../../core/image-builder.js'
import {DockerCliExecutor} from '../../engine/docker-executor.js'
import {loadProject} from '../utils.js'

export function registerBuildCommand(program: Command): void {
  program
    .command('build')
    .description('Build the project image from the version pin and lock files')
    .option('--dry-run', 'Render and validate the build context without building')
    .option('--verbose', 'Stream build output in real-time')
    .action(async (options: {dryRun?: boolean; verbose?: boolean}, cmd: Command) => {
      const {dir, config, reporter} = await loadProject(cmd, {verbose: options.verbose})
      const executor = new DockerCliExecutor()

      if (!options.dryRun) {
        await executor.check()
      }

      const builder = new ImageBuilder(executor, reporter)
      await builder.build(dir, config, {dryRun: options.dryRun})
    })
}
