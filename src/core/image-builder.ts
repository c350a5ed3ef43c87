import type {ContainerExecutor} from '../engine/executor.js'
import type {BuildImageResult} from '../engine/types.js'
import {ImageBuildError} from '../errors.js'
import {renderBuildContext, writeBuildContext, type BuildContextPaths, type RenderedBuildContext} from '../image/build-context.js'
import {versionBuildArg} from '../image/stages.js'
import type {DevcellConfig} from '../types.js'
import {checkLockFidelity, fingerprintInputs, readLockedDependencies, resolveManifestSet, type LockedDependency, type ManifestSet} from './manifests.js'
import type {Reporter} from './reporter.js'
import {readVersionPin, type VersionPin} from './version-pin.js'

/** Image labels recording what the image was built from. */
export const imageLabels = {
  inputs: 'devcell.inputs',
  python: 'devcell.python',
  account: 'devcell.account'
} as const

/** Everything a build needs, resolved and rendered, before the engine is involved. */
export type PreparedBuild = {
  pin: VersionPin;
  manifests: ManifestSet;
  fingerprint: string;
  dependencies: LockedDependency[];
  rendered: RenderedBuildContext;
  baseImage: string;
}

export type BuildOutcome = {
  image: string;
  fingerprint: string;
  paths: BuildContextPaths;
  /** False for a dry run. */
  built: boolean;
}

/**
 * Resolves build inputs in order: version pin first, so a missing pin
 * fails before anything else is read or written.
 */
export async function prepareBuild(projectDir: string, config: DevcellConfig): Promise<PreparedBuild> {
  const pin = await readVersionPin(projectDir, config.python.versionFile)
  const manifests = await resolveManifestSet(projectDir, config)
  const fingerprint = await fingerprintInputs(pin, manifests)
  const dependencies = await readLockedDependencies(manifests)
  await checkLockFidelity(manifests, dependencies)
  const rendered = renderBuildContext(config, manifests)

  return {
    pin,
    manifests,
    fingerprint,
    dependencies,
    rendered,
    baseImage: `python:${pin.version}-${config.python.variant}`
  }
}

/**
 * Builds the project image: resolve inputs, render the build context,
 * then hand the build to the executor. A failed build publishes no tag.
 */
export class ImageBuilder {
  constructor(
    private readonly executor: ContainerExecutor,
    private readonly reporter: Reporter
  ) {}

  async build(projectDir: string, config: DevcellConfig, options?: {dryRun?: boolean}): Promise<BuildOutcome> {
    const prepared = await prepareBuild(projectDir, config)
    const paths = await writeBuildContext(projectDir, prepared.rendered)

    if (options?.dryRun) {
      this.reporter.emit({
        event: 'BUILD_RENDERED',
        image: config.image,
        dockerfile: paths.dockerfile,
        entrypoint: paths.entrypoint
      })
      return {image: config.image, fingerprint: prepared.fingerprint, paths, built: false}
    }

    this.reporter.emit({
      event: 'BUILD_START',
      image: config.image,
      python: prepared.pin.version,
      fingerprint: prepared.fingerprint,
      stages: prepared.rendered.stages.map(s => s.name)
    })

    let result: BuildImageResult
    try {
      result = await this.executor.buildImage({
        tag: config.image,
        contextDir: paths.contextDir,
        dockerfile: paths.dockerfile,
        baseImage: prepared.baseImage,
        buildArgs: {[versionBuildArg]: prepared.pin.version},
        labels: {
          [imageLabels.inputs]: prepared.fingerprint,
          [imageLabels.python]: prepared.pin.version,
          [imageLabels.account]: `${config.account.name}:${config.account.uid}:${config.account.gid}`
        }
      }, ({stream, line}) => {
        this.reporter.log(config.image, stream, line)
      })
    } catch (error: unknown) {
      this.reporter.emit({event: 'BUILD_FAILED', image: config.image, error: error instanceof Error ? error.message : String(error)})
      throw error
    }

    if (result.exitCode !== 0) {
      this.reporter.emit({event: 'BUILD_FAILED', image: config.image, exitCode: result.exitCode, error: result.error})
      throw new ImageBuildError(config.image, result.exitCode)
    }

    this.reporter.emit({
      event: 'BUILD_FINISHED',
      image: config.image,
      fingerprint: prepared.fingerprint,
      dependencies: prepared.dependencies.length,
      durationMs: result.finishedAt.getTime() - result.startedAt.getTime()
    })

    return {image: config.image, fingerprint: prepared.fingerprint, paths, built: true}
  }

  /**
   * Compares the image's recorded inputs with the current ones.
   */
  async inspect(projectDir: string, config: DevcellConfig): Promise<ImageStatus> {
    const prepared = await prepareBuild(projectDir, config)
    const labels = await this.executor.imageLabels(config.image)
    if (!labels) {
      return {status: 'missing', image: config.image, fingerprint: prepared.fingerprint, dependencies: prepared.dependencies}
    }

    const recorded = labels[imageLabels.inputs]
    return {
      status: recorded === prepared.fingerprint ? 'up-to-date' : 'stale',
      image: config.image,
      fingerprint: prepared.fingerprint,
      recordedFingerprint: recorded,
      python: labels[imageLabels.python],
      dependencies: prepared.dependencies
    }
  }
}

export type ImageStatus = {
  status: 'missing' | 'up-to-date' | 'stale';
  image: string;
  /** Fingerprint of the current inputs. */
  fingerprint: string;
  /** Fingerprint recorded on the image, when it has one. */
  recordedFingerprint?: string;
  python?: string;
  dependencies: LockedDependency[];
}
