import {join, resolve} from 'node:path'
import type {Command} from 'commander'
import {loadConfig} from '../core/config.js'
import {loadOptionalEnvFile} from '../core/env-file.js'
import {ConsoleReporter, type Reporter} from '../core/reporter.js'
import type {DevcellConfig} from '../types.js'
import {InteractiveReporter} from './interactive-reporter.js'

export type GlobalOptions = {
  project: string;
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/**
 * Default for `--project`: `DEVCELL_PROJECT` from the environment, then from
 * `.env` in the working directory. The file is only read, never merged into
 * `env`: its `LOCAL_UID`/`LOCAL_GID` must not stand in for the caller's ids.
 */
export async function defaultProjectDir(env: Record<string, string | undefined>, cwd: string): Promise<string> {
  if (env.DEVCELL_PROJECT) {
    return env.DEVCELL_PROJECT
  }

  const dotenv = await loadOptionalEnvFile(join(cwd, '.env'), false)
  return dotenv.DEVCELL_PROJECT || '.'
}

export type Project = {
  dir: string;
  config: DevcellConfig;
  reporter: Reporter;
}

/**
 * Resolves the project directory, loads its configuration and picks the
 * reporter. Config deprecation notices go through the reporter.
 */
export async function loadProject(cmd: Command, reporterOptions?: {verbose?: boolean}): Promise<Project> {
  const {project, json} = getGlobalOptions(cmd)
  const dir = resolve(project)
  const reporter = json ? new ConsoleReporter() : new InteractiveReporter(reporterOptions)
  const {config, warnings} = await loadConfig(dir)

  for (const message of warnings) {
    reporter.emit({event: 'WARNING', message})
  }

  return {dir, config, reporter}
}
