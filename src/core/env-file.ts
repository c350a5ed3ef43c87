import {readFile} from 'node:fs/promises'
import {parse} from 'dotenv'
import {EnvFileError} from '../errors.js'

export async function loadEnvFile(filePath: string): Promise<Record<string, string>> {
  const content = await readFile(filePath, 'utf8')
  return parse(content)
}

/**
 * Loads an env file that may legitimately be absent.
 * Returns an empty record when the file is missing and not required.
 */
export async function loadOptionalEnvFile(filePath: string, required: boolean): Promise<Record<string, string>> {
  try {
    return await loadEnvFile(filePath)
  } catch (error: unknown) {
    if (!required && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {}
    }

    throw new EnvFileError(filePath, {cause: error})
  }
}
