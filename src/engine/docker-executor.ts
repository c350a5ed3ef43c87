import process from 'node:process'
import {execa} from 'execa'
import {BaseImageError, DockerError, DockerNotAvailableError} from '../errors.js'
import type {BindMount, BuildImageRequest, BuildImageResult, RunContainerRequest, RunContainerResult} from './types.js'
import {ContainerExecutor, type OnLogLine} from './executor.js'

/** Label set on every container this tool starts. */
export const containerLabel = 'devcell=true'

/**
 * Build a minimal environment for the Docker CLI process.
 * Only PATH, HOME, and DOCKER_* are kept — everything else is stripped
 * so that host secrets (API keys, tokens, credentials) never leak into
 * the container unless they are forwarded on purpose.
 */
function dockerCliEnv(): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME' || key.startsWith('DOCKER_'))) {
      env[key] = value
    }
  }

  return env
}

function mountField(value: string): string {
  return /[,"]/.test(value) ? `"${value.replaceAll('"', '""')}"` : value
}

/**
 * `--mount` value for a bind mount. Fields holding commas or quotes are
 * CSV-quoted, which is how the Docker CLI parses this flag.
 */
export function formatMount(mount: BindMount): string {
  const fields = [
    'type=bind',
    mountField(`src=${mount.hostPath}`),
    mountField(`dst=${mount.containerPath}`)
  ]
  if (mount.readOnly) {
    fields.push('readonly')
  }

  return fields.join(',')
}

/**
 * Build `docker build` arguments.
 */
export function buildBuildArgs(request: BuildImageRequest): string[] {
  const args = ['build', '--rm=true', '--progress', 'plain', '--file', request.dockerfile, '--tag', request.tag]

  for (const [key, value] of Object.entries(request.buildArgs)) {
    args.push('--build-arg', `${key}=${value}`)
  }

  for (const [key, value] of Object.entries(request.labels)) {
    args.push('--label', `${key}=${value}`)
  }

  args.push(request.contextDir)
  return args
}

/**
 * Build `docker run` arguments.
 */
export function buildRunArgs(request: RunContainerRequest): string[] {
  const args = ['run', '--rm', '--name', request.name, '--label', containerLabel]

  if (request.interactive) {
    args.push('--interactive')
  }

  if (request.tty) {
    args.push('--tty')
  }

  for (const mount of request.mounts) {
    args.push('--mount', formatMount(mount))
  }

  for (const [key, value] of Object.entries(request.env)) {
    args.push('-e', `${key}=${value}`)
  }

  // Name only: the value comes from the CLI's environment
  for (const key of Object.keys(request.secretEnv ?? {})) {
    args.push('-e', key)
  }

  args.push(request.image, ...(request.cmd ?? []))
  return args
}

const baseImagePattern = /failed to resolve source metadata|manifest unknown|pull access denied|repository does not exist/i

export class DockerCliExecutor extends ContainerExecutor {
  private static get maxTailLines() {
    return 50
  }

  private readonly env = dockerCliEnv()
  private readonly activeContainers = new Set<string>()

  async check(): Promise<void> {
    try {
      await execa('docker', ['--version'], {env: this.env, extendEnv: false})
    } catch (error) {
      throw new DockerNotAvailableError({cause: error})
    }
  }

  async buildImage(request: BuildImageRequest, onLogLine: OnLogLine): Promise<BuildImageResult> {
    const startedAt = new Date()
    const tail: string[] = []

    const proc = execa('docker', buildBuildArgs(request), {
      env: {...this.env, DOCKER_BUILDKIT: '1'},
      extendEnv: false,
      reject: false
    })

    const stdoutDone = (async () => {
      for await (const line of proc.iterable({from: 'stdout'})) {
        onLogLine({stream: 'stdout', line: String(line)})
      }
    })()

    const stderrDone = (async () => {
      for await (const line of proc.iterable({from: 'stderr'})) {
        const text = String(line)
        tail.push(text)
        if (tail.length > DockerCliExecutor.maxTailLines) {
          tail.shift()
        }

        onLogLine({stream: 'stderr', line: text})
      }
    })()

    await Promise.all([stdoutDone, stderrDone])
    const result = await proc

    if (result.failed && result.exitCode === undefined) {
      throw new DockerNotAvailableError({cause: result})
    }

    const exitCode = result.exitCode ?? 1
    if (exitCode !== 0 && tail.some(line => baseImagePattern.test(line))) {
      throw new BaseImageError(request.baseImage, {cause: result})
    }

    return {
      exitCode,
      startedAt,
      finishedAt: new Date(),
      error: exitCode === 0 ? undefined : tail.at(-1)
    }
  }

  async imageLabels(tag: string): Promise<Record<string, string> | undefined> {
    const result = await execa('docker', ['image', 'inspect', '--format', '{{json .Config.Labels}}', tag], {
      env: this.env,
      extendEnv: false,
      reject: false
    })

    if (result.exitCode !== 0) {
      if (/no such image/i.test(String(result.stderr))) {
        return undefined
      }

      throw new DockerError('IMAGE_INSPECT_FAILED', `Cannot inspect image "${tag}"`, {cause: result})
    }

    const labels = JSON.parse(String(result.stdout)) as Record<string, string> | null
    return labels ?? {}
  }

  async readImageFiles(tag: string, paths: string[]): Promise<string[]> {
    const contents: string[] = []
    for (const path of paths) {
      const result = await execa('docker', [
        'run', '--rm', '--network', 'none', '--label', containerLabel, '--entrypoint', 'cat', tag, path
      ], {env: this.env, extendEnv: false, reject: false})

      if (result.exitCode !== 0) {
        throw new DockerError('IMAGE_READ_FAILED', `Cannot read ${path} from image "${tag}"`, {cause: result})
      }

      contents.push(String(result.stdout))
    }

    return contents
  }

  async run(request: RunContainerRequest): Promise<RunContainerResult> {
    const startedAt = new Date()
    this.activeContainers.add(request.name)

    try {
      const result = await execa('docker', buildRunArgs(request), {
        env: {...request.secretEnv, ...this.env},
        extendEnv: false,
        stdio: 'inherit',
        reject: false
      })

      if (result.failed && result.exitCode === undefined && !result.isTerminated) {
        throw new DockerNotAvailableError({cause: result})
      }

      return {exitCode: result.exitCode ?? 1, startedAt, finishedAt: new Date()}
    } finally {
      this.activeContainers.delete(request.name)
    }
  }

  /**
   * Force-remove all containers currently being executed by this process.
   */
  async killRunningContainers(): Promise<void> {
    const names = [...this.activeContainers]
    if (names.length === 0) {
      return
    }

    await execa('docker', ['rm', '-f', ...names], {env: this.env, extendEnv: false, reject: false})
  }
}
