import type {Command} from 'commander'
import {ImageBuilder} from '../../core/image-builder.js'
import {DockerCliExecutor} from '../../engine/docker-executor.js'
import {loadProject} from '../utils.js'

export function registerRenderCommand(program: Command): void {
  program
    .command('render')
    .description('Write the Dockerfile and entrypoint to .devcell/ without building')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const {dir, config, reporter} = await loadProject(cmd)
      const builder = new ImageBuilder(new DockerCliExecutor(), reporter)
      await builder.build(dir, config, {dryRun: true})
    })
}
