import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {VersionPinError} from '../errors.js'

/** Interpreter version pin, read once at build time. */
export type VersionPin = {
  /** File the pin was read from, relative to the project. */
  file: string;
  /** Pin as written (e.g. `cpython@3.12.3`). */
  raw: string;
  /** Numeric version used for the base image tag (e.g. `3.12.3`). */
  version: string;
}

const pinPattern = /^(?:cpython@)?(\d+\.\d+(?:\.\d+)?)$/

/**
 * Parses the content of a version pin file.
 * The first non-blank, non-comment line is the pin.
 */
export function parseVersionPin(content: string, file: string): VersionPin {
  const line = content
    .split('\n')
    .map(l => l.trim())
    .find(l => l !== '' && !l.startsWith('#'))

  if (!line) {
    throw new VersionPinError('VERSION_PIN_INVALID', `Version pin file "${file}" is empty`)
  }

  const match = pinPattern.exec(line)
  if (!match) {
    throw new VersionPinError('VERSION_PIN_INVALID', `Version pin "${line}" in "${file}" is not MAJOR.MINOR[.PATCH]`)
  }

  return {file, raw: line, version: match[1]}
}

export async function readVersionPin(projectDir: string, file: string): Promise<VersionPin> {
  let content: string
  try {
    content = await readFile(join(projectDir, file), 'utf8')
  } catch (error: unknown) {
    throw new VersionPinError('VERSION_PIN_MISSING', `Cannot read version pin file "${file}"`, {cause: error})
  }

  return parseVersionPin(content, file)
}
