import process from 'node:process'
import type {Command} from 'commander'
import {RunOrchestrator} from '../../core/run-orchestrator.js'
import {captureHostIdentity, requestedIdentity} from '../../identity/host-identity.js'
import {DockerCliExecutor} from '../../engine/docker-executor.js'
import {loadProject} from '../utils.js'

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run the application (or a command) in the project image as the current user')
    .argument('[command...]', 'Command replacing the default one')
    .option('--shell', 'Start an interactive shell instead of the application')
    .passThroughOptions()
    .action(async (command: string[], options: {shell?: boolean}, cmd: Command) => {
      // Captured before anything else happens
      const host = captureHostIdentity()
      const {dir, config, reporter} = await loadProject(cmd)
      const identity = requestedIdentity(process.env, config.identity, host)
      const executor = new DockerCliExecutor()
      await executor.check()

      const onSignal = (signal: NodeJS.Signals) => {
        void (async () => {
          await executor.killRunningContainers()
          process.kill(process.pid, signal)
        })()
      }

      process.once('SIGTERM', onSignal)
      process.once('SIGHUP', onSignal)
      // Docker proxies Ctrl-C to the container; we exit when it does
      process.on('SIGINT', () => {/* noop */})

      const orchestrator = new RunOrchestrator(executor, reporter)
      const result = await orchestrator.run(dir, config, {
        identity,
        cmd: command,
        shell: options.shell,
        tty: process.stdin.isTTY
      })

      process.exitCode = result.exitCode
    })
}
