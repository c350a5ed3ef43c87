import {createHash} from 'node:crypto'
import {access, constants, readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {parse as parseToml} from 'smol-toml'
import {LockInconsistentError, ManifestError} from '../errors.js'
import type {DevcellConfig} from '../types.js'
import type {VersionPin} from './version-pin.js'

export type ManifestRole = 'descriptor' | 'lock' | 'dev-lock' | 'version' | 'extra'

export type ManifestFile = {
  role: ManifestRole;
  /** Path relative to the project directory (and to the image working directory). */
  path: string;
  /** Absolute path on the host. */
  hostPath: string;
}

/** Ordered manifest files consumed by the dependency sync stage. */
export type ManifestSet = {
  files: ManifestFile[];
}

export type LockedDependency = {
  name: string;
  version: string;
}

/** Roles whose content decides which dependencies end up in the image. */
const fingerprintRoles = new Set<ManifestRole>(['descriptor', 'lock', 'dev-lock'])

/**
 * Lists the manifest files declared by the configuration, in build order,
 * and checks that each one is readable.
 */
export async function resolveManifestSet(projectDir: string, config: DevcellConfig): Promise<ManifestSet> {
  const declared: Array<[ManifestRole, string]> = [
    ['descriptor', config.manifests.descriptor],
    ['lock', config.manifests.lock],
    ['dev-lock', config.manifests.devLock],
    ['version', config.python.versionFile],
    ...config.manifests.extra.map((path): [ManifestRole, string] => ['extra', path])
  ]

  const seen = new Set<string>()
  const files: ManifestFile[] = []
  for (const [role, path] of declared) {
    if (seen.has(path)) {
      continue
    }

    seen.add(path)
    const hostPath = join(projectDir, path)
    try {
      await access(hostPath, constants.R_OK)
    } catch (error: unknown) {
      throw new ManifestError(path, `Build input "${path}" is missing or unreadable`, {cause: error})
    }

    files.push({role, path, hostPath})
  }

  return {files}
}

/** Package name as compared across descriptor and lock files (`Zope_Interface` → `zope-interface`). */
function normalizeName(name: string): string {
  return name.toLowerCase().replaceAll(/[-_.]+/g, '-')
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
}

/**
 * Reads the names of `[project].dependencies` from a `pyproject.toml`.
 * A descriptor without that table declares nothing.
 */
export function parseDescriptorDependencies(content: string, file: string): string[] {
  let document: Record<string, unknown>
  try {
    document = parseToml(content)
  } catch (error: unknown) {
    throw new ManifestError(file, `Cannot parse "${file}"`, {cause: error, code: 'MANIFEST_INVALID'})
  }

  const {project} = document
  if (project === undefined) {
    return []
  }

  if (!isTable(project)) {
    throw new ManifestError(file, `"project" in "${file}" must be a table`, {code: 'MANIFEST_INVALID'})
  }

  const {dependencies} = project
  if (dependencies === undefined) {
    return []
  }

  if (!Array.isArray(dependencies)) {
    throw new ManifestError(file, `"project.dependencies" in "${file}" must be a list`, {code: 'MANIFEST_INVALID'})
  }

  const names = new Set<string>()
  for (const requirement of dependencies) {
    const match = typeof requirement === 'string' ? /^\s*([A-Za-z\d][\w.-]*)/.exec(requirement) : null
    if (!match) {
      const shown = typeof requirement === 'string' ? JSON.stringify(requirement) : String(requirement)
      throw new ManifestError(file, `Invalid requirement ${shown} in "${file}"`, {code: 'MANIFEST_INVALID'})
    }

    names.add(normalizeName(match[1]))
  }

  return [...names].sort()
}

/**
 * Fails when the descriptor declares a dependency the production lock does
 * not pin. The sync stage installs the lock as-is (`--no-lock`).
 */
export async function checkLockFidelity(manifests: ManifestSet, locked: LockedDependency[]): Promise<void> {
  const descriptor = manifests.files.find(f => f.role === 'descriptor')
  const lock = manifests.files.find(f => f.role === 'lock')
  if (!descriptor || !lock) {
    return
  }

  const pinned = new Set(locked.map(d => d.name))
  const declared = parseDescriptorDependencies(await readFile(descriptor.hostPath, 'utf8'), descriptor.path)
  const missing = declared.filter(name => !pinned.has(name))
  if (missing.length > 0) {
    throw new LockInconsistentError(lock.path, descriptor.path, missing)
  }
}

/**
 * Parses a `requirements.lock` style file into a sorted dependency list.
 * Comments, options (`--index-url`, `-e ...`) and blank lines are skipped.
 */
export function parseLockFile(content: string): LockedDependency[] {
  const byName = new Map<string, LockedDependency>()
  for (const rawLine of content.split('\n')) {
    const line = rawLine.replace(/#.*$/, '').trim()
    if (line === '' || line.startsWith('-')) {
      continue
    }

    const match = /^([A-Za-z\d][\w.-]*)(?:\[[^\]]*])?\s*==\s*([^\s;]+)/.exec(line)
    if (!match) {
      continue
    }

    const name = normalizeName(match[1])
    byName.set(name, {name, version: match[2]})
  }

  return [...byName.values()].sort((a, b) => a.name.localeCompare(b.name))
}

export async function readLockedDependencies(manifests: ManifestSet, role: 'lock' | 'dev-lock' = 'lock'): Promise<LockedDependency[]> {
  const file = manifests.files.find(f => f.role === role)
  if (!file) {
    return []
  }

  return parseLockFile(await readFile(file.hostPath, 'utf8'))
}

/**
 * SHA256 over the version pin and the dependency-deciding manifests.
 *
 * ```
 * SHA256(version + for each file: path + NUL + content + NUL)
 * ```
 *
 * Extra files (README) are mounted for the sync step but do not select
 * dependencies, so they are left out.
 */
export async function fingerprintInputs(pin: VersionPin, manifests: ManifestSet): Promise<string> {
  const hash = createHash('sha256')
  hash.update(pin.version)
  for (const file of manifests.files) {
    if (!fingerprintRoles.has(file.role)) {
      continue
    }

    hash.update(file.path)
    hash.update('\0')
    hash.update(await readFile(file.hostPath))
    hash.update('\0')
  }

  return hash.digest('hex')
}
