import {readFile} from 'node:fs/promises'
import {basename, join, posix, resolve} from 'node:path'
import {deburr} from 'lodash-es'
import {parse as parseYaml} from 'yaml'
import {ConfigError} from '../errors.js'
import type {DevcellConfig, DevcellConfigFile, MissingIdentityPolicy} from '../types.js'

export const configFileName = '.devcell.yml'

/** Result of loading `.devcell.yml`, with deprecation notices to surface to the user. */
export type LoadedConfig = {
  config: DevcellConfig;
  warnings: string[];
}

const identityPolicies = new Set<MissingIdentityPolicy>(['refuse', 'placeholder'])

/** Largest id accepted by shadow-utils (`(uid_t) -1` is reserved). */
export const maxNumericId = 4_294_967_294

/** Convert a free-form name into a valid image name. */
export function slugify(name: string): string {
  return deburr(name)
    .toLowerCase()
    .replaceAll(/[^a-z\d._-]/g, '-')
    .replaceAll(/-{2,}/g, '-')
    .replace(/^[-._]+/, '')
    .replace(/[-._]+$/, '')
}

/**
 * Loads the project-level `.devcell.yml` configuration from a directory.
 * A missing file yields the defaults.
 */
export async function loadConfig(projectDir: string): Promise<LoadedConfig> {
  let content: string
  try {
    content = await readFile(join(projectDir, configFileName), 'utf8')
  } catch (error: unknown) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return resolveConfig({}, projectDir)
    }

    throw error
  }

  const parsed = parseYaml(content) as unknown
  if (parsed === null || parsed === undefined) {
    return resolveConfig({}, projectDir)
  }

  if (!isMapping(parsed)) {
    throw new ConfigError(configFileName, 'must contain a mapping')
  }

  for (const section of sections) {
    const value = parsed[section]
    if (value !== undefined && value !== null && !isMapping(value)) {
      throw new ConfigError(section, 'must be a mapping')
    }
  }

  return resolveConfig(parsed as DevcellConfigFile, projectDir)
}

/** Keys of `.devcell.yml` that hold nested settings. */
const sections = ['account', 'python', 'manifests', 'mount', 'identity'] as const

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Applies defaults and validates a raw configuration object.
 */
export function resolveConfig(raw: DevcellConfigFile, projectDir: string): LoadedConfig {
  const warnings: string[] = []

  const image = optionalString(raw.image, 'image') ?? slugify(basename(resolve(projectDir)))
  if (!image) {
    throw new ConfigError('image', 'cannot derive an image name from the project directory')
  }

  if (!/^[a-z\d][a-z\d_./:-]*$/.test(image)) {
    throw new ConfigError('image', `"${image}" is not a valid image reference`)
  }

  const accountName = optionalString(raw.account?.name, 'account.name') ?? 'user'
  if (!/^[a-z_][a-z\d_-]*$/.test(accountName)) {
    throw new ConfigError('account.name', `"${accountName}" is not a valid account name`)
  }

  const workdir = optionalString(raw.workdir, 'workdir') ?? '/workspace'
  if (!posix.isAbsolute(workdir)) {
    throw new ConfigError('workdir', 'must be an absolute path')
  }

  const onMissing = raw.identity?.onMissing ?? 'refuse'
  if (!identityPolicies.has(onMissing)) {
    throw new ConfigError('identity.onMissing', `expected "refuse" or "placeholder", got "${String(onMissing)}"`)
  }

  let manifestMounts = optionalBoolean(raw.mount?.manifests, 'mount.manifests')
  const strategy = raw.mount?.strategy
  if (strategy !== undefined) {
    if (strategy !== 'whole-tree' && strategy !== 'per-file') {
      throw new ConfigError('mount.strategy', `expected "whole-tree" or "per-file", got "${String(strategy)}"`)
    }

    warnings.push(`"mount.strategy" is deprecated, use "mount.manifests: ${String(strategy === 'per-file')}" instead`)
    manifestMounts ??= strategy === 'per-file'
  }

  const envFile = optionalString(raw.envFile, 'envFile')

  const config: DevcellConfig = {
    image,
    account: {
      name: accountName,
      uid: optionalId(raw.account?.uid, 'account.uid') ?? 999,
      gid: optionalId(raw.account?.gid, 'account.gid') ?? 999
    },
    python: {
      versionFile: relativePath(raw.python?.versionFile, 'python.versionFile') ?? '.python-version',
      variant: optionalString(raw.python?.variant, 'python.variant') ?? 'slim-bookworm'
    },
    manifests: {
      descriptor: relativePath(raw.manifests?.descriptor, 'manifests.descriptor') ?? 'pyproject.toml',
      lock: relativePath(raw.manifests?.lock, 'manifests.lock') ?? 'requirements.lock',
      devLock: relativePath(raw.manifests?.devLock, 'manifests.devLock') ?? 'requirements-dev.lock',
      extra: stringList(raw.manifests?.extra, 'manifests.extra') ?? ['README.md']
    },
    workdir,
    source: relativePath(raw.source, 'source') ?? 'src',
    entry: relativePath(raw.entry, 'entry') ?? 'src/main.py',
    envFile: envFile ? {path: envFile, required: true} : {path: '.env', required: false},
    mount: {manifests: manifestMounts ?? false},
    identity: {
      onMissing,
      uidVar: envVarName(raw.identity?.uidVar, 'identity.uidVar') ?? 'LOCAL_UID',
      gidVar: envVarName(raw.identity?.gidVar, 'identity.gidVar') ?? 'LOCAL_GID'
    }
  }

  if (config.account.uid === 0) {
    throw new ConfigError('account.uid', 'the placeholder account cannot be root')
  }

  if (config.identity.uidVar === config.identity.gidVar) {
    throw new ConfigError('identity.gidVar', 'must differ from identity.uidVar')
  }

  return {config, warnings}
}

function optionalString(value: unknown, key: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(key, 'must be a non-empty string')
  }

  return value.trim()
}

function optionalBoolean(value: unknown, key: string): boolean | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'boolean') {
    throw new ConfigError(key, 'must be a boolean')
  }

  return value
}

function optionalId(value: unknown, key: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > maxNumericId) {
    throw new ConfigError(key, 'must be an integer id')
  }

  return value
}

function relativePath(value: unknown, key: string): string | undefined {
  const path = optionalString(value, key)
  if (path === undefined) {
    return undefined
  }

  if (path.startsWith('/') || path.split('/').includes('..')) {
    throw new ConfigError(key, `"${path}" must be a relative path inside the project`)
  }

  return path
}

function stringList(value: unknown, key: string): string[] | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  if (!Array.isArray(value)) {
    throw new ConfigError(key, 'must be a list of paths')
  }

  return value.map((item, index) => {
    const path = relativePath(item, `${key}[${index}]`)
    if (path === undefined) {
      throw new ConfigError(`${key}[${index}]`, 'must be a non-empty string')
    }

    return path
  })
}

function envVarName(value: unknown, key: string): string | undefined {
  const name = optionalString(value, key)
  if (name !== undefined && !/^[A-Z_][A-Z\d_]*$/.test(name)) {
    throw new ConfigError(key, `"${name}" is not a valid environment variable name`)
  }

  return name
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}
