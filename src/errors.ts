export class DevcellError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'DevcellError'
  }
}

// -- Build input errors ------------------------------------------------------

export class BuildInputError extends DevcellError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'BuildInputError'
  }
}

export class VersionPinError extends BuildInputError {
  constructor(code: 'VERSION_PIN_MISSING' | 'VERSION_PIN_INVALID', message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'VersionPinError'
  }
}

export class ManifestError extends BuildInputError {
  constructor(
    readonly file: string,
    message: string,
    options?: {cause?: unknown; code?: 'MANIFEST_MISSING' | 'MANIFEST_INVALID' | 'LOCK_INCONSISTENT'}
  ) {
    super(options?.code ?? 'MANIFEST_MISSING', message, {cause: options?.cause})
    this.name = 'ManifestError'
  }
}

/**
 * The descriptor declares dependencies the lock file does not pin.
 * Raised before the build so that no sync step ever re-resolves.
 */
export class LockInconsistentError extends ManifestError {
  constructor(
    file: string,
    readonly descriptor: string,
    readonly missing: string[]
  ) {
    super(
      file,
      `Lock file "${file}" does not pin ${missing.join(', ')}, declared in "${descriptor}"`,
      {code: 'LOCK_INCONSISTENT'}
    )
    this.name = 'LockInconsistentError'
  }
}

// -- Configuration errors ----------------------------------------------------

export class ConfigError extends DevcellError {
  constructor(readonly key: string, message: string, options?: {cause?: unknown}) {
    super('INVALID_CONFIG', `Invalid config "${key}": ${message}`, options)
    this.name = 'ConfigError'
  }
}

export class EnvFileError extends DevcellError {
  constructor(filePath: string, options?: {cause?: unknown}) {
    super('ENV_FILE_UNREADABLE', `Cannot read environment file "${filePath}"`, options)
    this.name = 'EnvFileError'
  }
}

export class MountError extends DevcellError {
  constructor(readonly hostPath: string, options?: {cause?: unknown}) {
    super('MOUNT_SOURCE_MISSING', `Mount source "${hostPath}" does not exist`, options)
    this.name = 'MountError'
  }
}

export class StageError extends DevcellError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('INVALID_STAGES', message, options)
    this.name = 'StageError'
  }
}

// -- Docker errors -----------------------------------------------------------

export class DockerError extends DevcellError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'DockerError'
  }
}

export class DockerNotAvailableError extends DockerError {
  constructor(options?: {cause?: unknown}) {
    super('DOCKER_NOT_AVAILABLE', 'Docker CLI not found. Please install Docker.', options)
    this.name = 'DockerNotAvailableError'
  }
}

export class BaseImageError extends DockerError {
  constructor(readonly image: string, options?: {cause?: unknown}) {
    super('BASE_IMAGE_UNRESOLVABLE', `Cannot resolve base image "${image}"`, options)
    this.name = 'BaseImageError'
  }
}

export class ImageBuildError extends DockerError {
  constructor(
    readonly tag: string,
    readonly exitCode: number,
    options?: {cause?: unknown}
  ) {
    super('IMAGE_BUILD_FAILED', `Build of image "${tag}" failed with exit code ${exitCode}`, options)
    this.name = 'ImageBuildError'
  }
}

export class ImageNotFoundError extends DockerError {
  constructor(readonly tag: string, options?: {cause?: unknown}) {
    super('IMAGE_NOT_FOUND', `Image "${tag}" not found. Run "devcell build" first.`, options)
    this.name = 'ImageNotFoundError'
  }
}

// -- Identity errors ---------------------------------------------------------

export class IdentityError extends DevcellError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'IdentityError'
  }
}

export class MissingIdentityError extends IdentityError {
  constructor(readonly variables: string[], options?: {cause?: unknown}) {
    super('IDENTITY_MISSING', `Missing identity variable(s): ${variables.join(', ')}`, options)
    this.name = 'MissingIdentityError'
  }
}

export class MalformedIdentityError extends IdentityError {
  constructor(readonly variable: string, readonly value: string, options?: {cause?: unknown}) {
    super('IDENTITY_MALFORMED', `${variable} must be a decimal id, got "${value}"`, options)
    this.name = 'MalformedIdentityError'
  }
}

export class RootIdentityError extends IdentityError {
  constructor(options?: {cause?: unknown}) {
    super('IDENTITY_ROOT', 'Refusing to run the workload as root (uid 0)', options)
    this.name = 'RootIdentityError'
  }
}

export class IdentityCollisionError extends IdentityError {
  constructor(
    readonly kind: 'uid' | 'gid',
    readonly id: number,
    readonly owner: string,
    options?: {cause?: unknown}
  ) {
    super(
      kind === 'uid' ? 'UID_COLLISION' : 'GID_COLLISION',
      `${kind} ${id} is already assigned to ${kind === 'uid' ? 'user' : 'group'} "${owner}"`,
      options
    )
    this.name = 'IdentityCollisionError'
  }
}

export class AccountNotFoundError extends IdentityError {
  constructor(readonly account: string, options?: {cause?: unknown}) {
    super('ACCOUNT_NOT_FOUND', `Account "${account}" not found in the image`, options)
    this.name = 'AccountNotFoundError'
  }
}
