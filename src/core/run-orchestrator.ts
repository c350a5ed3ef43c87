import {randomBytes} from 'node:crypto'
import {join, posix, resolve} from 'node:path'
import type {ContainerExecutor} from '../engine/executor.js'
import type {BindMount, RunContainerResult} from '../engine/types.js'
import {ImageNotFoundError, MountError} from '../errors.js'
import {findAccount, parseAccountDatabase} from '../identity/account-db.js'
import {captureHostIdentity, identityEnv, type NumericIdentity} from '../identity/host-identity.js'
import {planOwnership} from '../identity/ownership.js'
import {reconcile, type ReconcileOutcome} from '../identity/reconcile.js'
import {entrypointOptions} from '../image/entrypoint-script.js'
import type {DevcellConfig} from '../types.js'
import {slugify} from './config.js'
import {loadOptionalEnvFile} from './env-file.js'
import {resolveManifestSet} from './manifests.js'
import type {Reporter} from './reporter.js'
import {isDirectory} from './utils.js'

export type RunOptions = {
  /** Command replacing the image's default command. */
  cmd?: string[];
  /** Start an interactive shell instead of the default command. */
  shell?: boolean;
  /** Allocate a terminal. */
  tty?: boolean;
  /** Identity to hand over (defaults to the invoking user's, captured at call time). */
  identity?: NumericIdentity;
}

/** Variables the Docker CLI itself runs with; forwarding them by name would pass the host's value. */
function isDockerCliVariable(key: string): boolean {
  return key === 'PATH' || key === 'HOME' || key.startsWith('DOCKER_')
}

/** Container path the host source tree is mounted at. */
export function sourceMountPath(config: DevcellConfig): string {
  return posix.join(config.workdir, 'src')
}

/**
 * Host paths to bind into the container.
 *
 * Always the source tree at `<workdir>/src`. With `mount.manifests`, also
 * each manifest file the image build consulted, at the same relative path
 * under the working directory, so lock updates made inside the container
 * land on the host.
 */
export async function buildMountSet(projectDir: string, config: DevcellConfig): Promise<BindMount[]> {
  const sourceDir = resolve(projectDir, config.source)
  if (!await isDirectory(sourceDir)) {
    throw new MountError(sourceDir)
  }

  const mounts: BindMount[] = [{hostPath: sourceDir, containerPath: sourceMountPath(config)}]

  if (config.mount.manifests) {
    const manifests = await resolveManifestSet(projectDir, config)
    for (const file of manifests.files) {
      mounts.push({hostPath: file.hostPath, containerPath: posix.join(config.workdir, file.path)})
    }
  }

  return mounts
}

/**
 * Starts exactly one container from the project image, handing it the
 * invoking user's identity.
 */
export class RunOrchestrator {
  constructor(
    private readonly executor: ContainerExecutor,
    private readonly reporter: Reporter
  ) {}

  async run(projectDir: string, config: DevcellConfig, options: RunOptions = {}): Promise<RunContainerResult> {
    const identity = options.identity ?? captureHostIdentity()
    const mounts = await buildMountSet(projectDir, config)
    const secretEnv = await this.loadEnv(projectDir, config)

    await this.preflight(config, identity)

    const container = `${slugify(config.image.replace(/:[^/]*$/, ''))}-${randomBytes(4).toString('hex')}`
    const cmd = options.shell ? ['bash'] : (options.cmd?.length ? options.cmd : undefined)

    this.reporter.emit({event: 'RUN_STARTING', image: config.image, container, mounts, cmd})

    const result = await this.executor.run({
      name: container,
      image: config.image,
      cmd,
      env: identityEnv(identity, config.identity),
      secretEnv,
      mounts,
      interactive: true,
      tty: options.tty ?? false
    })

    this.reporter.emit({
      event: 'RUN_FINISHED',
      image: config.image,
      container,
      exitCode: result.exitCode,
      durationMs: result.finishedAt.getTime() - result.startedAt.getTime()
    })

    return result
  }

  /**
   * Checks the identity against the image's own account database, so a
   * collision or a root identity fails here rather than inside the container.
   * Containers start from the image every time, so this is exactly what the
   * entrypoint will see.
   */
  async preflight(config: DevcellConfig, identity: NumericIdentity): Promise<ReconcileOutcome> {
    const labels = await this.executor.imageLabels(config.image)
    if (!labels) {
      throw new ImageNotFoundError(config.image)
    }

    const [passwd, group] = await this.executor.readImageFiles(config.image, ['/etc/passwd', '/etc/group'])
    const db = parseAccountDatabase(passwd, group)
    const outcome = reconcile(identity, findAccount(db, config.account.name), db)

    this.reporter.emit({
      event: 'IDENTITY_RESOLVED',
      image: config.image,
      account: config.account.name,
      uid: identity.uid,
      gid: identity.gid,
      status: outcome.status,
      changes: outcome.status === 'adjusted' ? outcome.changes : [],
      ownership: planOwnership(outcome, entrypointOptions(config).ownedPaths)
    })

    return outcome
  }

  private async loadEnv(projectDir: string, config: DevcellConfig): Promise<Record<string, string>> {
    const env = await loadOptionalEnvFile(join(projectDir, config.envFile.path), config.envFile.required)
    const reserved = new Set([config.identity.uidVar, config.identity.gidVar])
    const forwarded: Record<string, string> = {}

    for (const [key, value] of Object.entries(env)) {
      if (reserved.has(key)) {
        this.reporter.emit({event: 'WARNING', message: `Ignoring ${key} from ${config.envFile.path}: the host identity is used`})
        continue
      }

      if (isDockerCliVariable(key)) {
        this.reporter.emit({event: 'WARNING', message: `Ignoring ${key} from ${config.envFile.path}: reserved for the Docker CLI`})
        continue
      }

      forwarded[key] = value
    }

    return forwarded
  }
}
