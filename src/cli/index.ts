#!/usr/bin/env node
import process from 'node:process'
import chalk from 'chalk'
import {Command} from 'commander'
import {DevcellError} from '../errors.js'
import {registerBuildCommand} from './commands/build.js'
import {registerCheckCommand} from './commands/check.js'
import {registerInspectCommand} from './commands/inspect.js'
import {registerRenderCommand} from './commands/render.js'
import {registerRunCommand} from './commands/run.js'
import {defaultProjectDir} from './utils.js'

async function main() {
  const program = new Command()

  program
    .name('devcell')
    .description('Pinned, identity-aware container environment for a Python project')
    .version('0.1.0')
    .enablePositionalOptions()
    .option('--project <dir>', 'Project directory', await defaultProjectDir(process.env, process.cwd()))
    .option('--json', 'Output structured JSON logs')

  registerBuildCommand(program)
  registerRunCommand(program)
  registerRenderCommand(program)
  registerInspectCommand(program)
  registerCheckCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  if (error instanceof DevcellError) {
    console.error(chalk.red(`✗ ${error.message}`) + chalk.gray(` [${error.code}]`))
    process.exitCode = 1
  } else {
    console.error('Fatal error:', error)
    throw error
  }
}
