import {mkdir, mkdtemp, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {dirname, join} from 'node:path'
import {resolveConfig} from '../core/config.js'
import type {DevcellEvent, Reporter} from '../core/reporter.js'
import {ContainerExecutor, type OnLogLine} from '../engine/executor.js'
import type {BuildImageRequest, BuildImageResult, RunContainerRequest, RunContainerResult} from '../engine/types.js'
import type {DevcellConfig, DevcellConfigFile} from '../types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'devcell-test-'))
}

/**
 * Silent reporter — all methods are no-ops.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */},
  log() {/* noop */}
}

/**
 * Returns a reporter that records emit() and log() calls for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: DevcellEvent[]; lines: string[]} {
  const events: DevcellEvent[] = []
  const lines: string[] = []
  const reporter: Reporter = {
    emit(event: DevcellEvent) {
      events.push(event)
    },
    log(_image, _stream, line) {
      lines.push(line)
    }
  }

  return {reporter, events, lines}
}

// -- Image account database --------------------------------------------------

export const imagePasswd = [
  'root:x:0:0:root:/root:/bin/bash',
  'daemon:x:1:1:daemon:/usr/sbin:/usr/sbin/nologin',
  'user:x:999:999::/home/user:/bin/bash',
  'app:x:1001:1001::/home/app:/bin/sh',
  'nobody:x:65534:65534:nobody:/nonexistent:/usr/sbin/nologin'
].join('\n') + '\n'

export const imageGroup = [
  'root:x:0:',
  'daemon:x:1:',
  'staff:x:50:app,daemon',
  'user:x:999:',
  'app:x:1001:',
  'nogroup:x:65534:'
].join('\n') + '\n'

// -- Project fixture ----------------------------------------------------------

export const projectFiles: Record<string, string> = {
  '.python-version': '3.12.3\n',
  'pyproject.toml': '[project]\nname = "sample"\nversion = "0.1.0"\ndependencies = ["requests>=2"]\n',
  'requirements.lock': '# generated by rye\n-e file:.\ncertifi==2024.8.30\nrequests==2.32.3\nurllib3==2.2.3\n',
  'requirements-dev.lock': '# generated by rye\n-e file:.\ncertifi==2024.8.30\npytest==8.3.3\nrequests==2.32.3\nurllib3==2.2.3\n',
  'README.md': '# sample\n',
  'src/main.py': 'print("hello")\n'
}

/**
 * Writes a complete sample project into a fresh temp directory.
 * `overrides` replaces file contents; `null` leaves a file out.
 */
export async function createProject(overrides: Record<string, string | null> = {}): Promise<string> {
  const dir = await createTmpDir()
  const files = {...projectFiles, ...overrides}
  for (const [path, content] of Object.entries(files)) {
    if (content === null) {
      continue
    }

    const target = join(dir, path)
    await mkdir(dirname(target), {recursive: true})
    await writeFile(target, content, 'utf8')
  }

  return dir
}

export function testConfig(raw: DevcellConfigFile = {}): DevcellConfig {
  return resolveConfig({image: 'sample', ...raw}, '/tmp/sample').config
}

// -- In-process executor ------------------------------------------------------

/**
 * Executor double: records requests and answers from canned data.
 */
export class FakeExecutor extends ContainerExecutor {
  readonly builds: BuildImageRequest[] = []
  readonly runs: RunContainerRequest[] = []
  readonly reads: string[][] = []
  labels: Record<string, string> | undefined = {}
  files: Record<string, string> = {'/etc/passwd': imagePasswd, '/etc/group': imageGroup}
  buildExitCode = 0
  buildError: Error | undefined
  buildOutput: string[] = []
  runExitCode = 0
  killed = 0

  async check(): Promise<void> {
    // Always available
  }

  async buildImage(request: BuildImageRequest, onLogLine: OnLogLine): Promise<BuildImageResult> {
    this.builds.push(request)
    if (this.buildError) {
      throw this.buildError
    }

    for (const line of this.buildOutput) {
      onLogLine({stream: 'stderr', line})
    }

    const startedAt = new Date(0)
    return {
      exitCode: this.buildExitCode,
      startedAt,
      finishedAt: new Date(1500),
      error: this.buildExitCode === 0 ? undefined : this.buildOutput.at(-1)
    }
  }

  async imageLabels(_tag: string): Promise<Record<string, string> | undefined> {
    return this.labels
  }

  async readImageFiles(_tag: string, paths: string[]): Promise<string[]> {
    this.reads.push(paths)
    return paths.map(path => this.files[path] ?? '')
  }

  async run(request: RunContainerRequest): Promise<RunContainerResult> {
    this.runs.push(request)
    return {exitCode: this.runExitCode, startedAt: new Date(0), finishedAt: new Date(250)}
  }

  async killRunningContainers(): Promise<void> {
    this.killed++
  }
}
