/**
 * Programmatic API.
 *
 * Builds a Python project image pinned to its version file and lock files,
 * and runs it with the in-container account aligned to the caller's uid/gid.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {loadConfig, ImageBuilder, RunOrchestrator, DockerCliExecutor, ConsoleReporter} from 'devcell'
 *
 * const {config} = await loadConfig('/path/to/project')
 * const executor = new DockerCliExecutor()
 * const reporter = new ConsoleReporter()
 *
 * await new ImageBuilder(executor, reporter).build('/path/to/project', config)
 * const {exitCode} = await new RunOrchestrator(executor, reporter).run('/path/to/project', config)
 * ```
 */

// Configuration and build inputs
export {loadConfig, resolveConfig, slugify, configFileName, type LoadedConfig} from './core/config.js'
export {loadEnvFile, loadOptionalEnvFile} from './core/env-file.js'
export {readVersionPin, parseVersionPin, type VersionPin} from './core/version-pin.js'
export {
  resolveManifestSet,
  parseLockFile,
  readLockedDependencies,
  parseDescriptorDependencies,
  checkLockFidelity,
  fingerprintInputs,
  type ManifestSet,
  type ManifestFile,
  type ManifestRole,
  type LockedDependency
} from './core/manifests.js'

// Image construction
export {ImageBuilder, prepareBuild, imageLabels, type PreparedBuild, type BuildOutcome, type ImageStatus} from './core/image-builder.js'
export {defineStages, validateStages, contextFiles, type BuildStage, type StageName, type StageInput, type Instruction, type BuildMount} from './image/stages.js'
export {renderDockerfile, renderDockerignore} from './image/dockerfile.js'
export {renderEntrypointScript, entrypointOptions, entrypointPath, type EntrypointOptions} from './image/entrypoint-script.js'
export {renderBuildContext, writeBuildContext, contextDirName, type RenderedBuildContext, type BuildContextPaths} from './image/build-context.js'

// Identity reconciliation
export {captureHostIdentity, readIdentityEnv, requestedIdentity, parseNumericId, identityEnv, type NumericIdentity, type RequestedIdentity} from './identity/host-identity.js'
export {parsePasswd, parseGroup, parseAccountDatabase, findAccount, type AccountDatabase, type AccountRecord, type PasswdEntry, type GroupEntry} from './identity/account-db.js'
export {reconcile, applyOutcome, type ReconcileOutcome, type IdentityChange} from './identity/reconcile.js'
export {planOwnership, renderOwnershipOperation, type OwnershipOperation} from './identity/ownership.js'

// Running
export {RunOrchestrator, buildMountSet, sourceMountPath, type RunOptions} from './core/run-orchestrator.js'
export {ContainerExecutor, type LogLine, type OnLogLine} from './engine/executor.js'
export {DockerCliExecutor, buildBuildArgs, buildRunArgs, formatMount} from './engine/docker-executor.js'
export type {BindMount, BuildImageRequest, BuildImageResult, RunContainerRequest, RunContainerResult} from './engine/types.js'

// Reporting
export {ConsoleReporter, type Reporter, type DevcellEvent} from './core/reporter.js'

// Domain types
export type {DevcellConfig, DevcellConfigFile, AccountConfig, IdentityConfig, MissingIdentityPolicy} from './types.js'

// Errors
export {
  DevcellError,
  BuildInputError,
  VersionPinError,
  ManifestError,
  LockInconsistentError,
  ConfigError,
  EnvFileError,
  MountError,
  StageError,
  DockerError,
  DockerNotAvailableError,
  BaseImageError,
  ImageBuildError,
  ImageNotFoundError,
  IdentityError,
  MissingIdentityError,
  MalformedIdentityError,
  RootIdentityError,
  IdentityCollisionError,
  AccountNotFoundError
} from './errors.js'
