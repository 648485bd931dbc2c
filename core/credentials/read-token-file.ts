import { readFile } from 'node:fs/promises'

import { MissingConfigError } from '../errors/missing-config-error'

/**
 * Read an API token from a plaintext file.
 *
 * @param path - Token file.
 * @returns Token without surrounding whitespace.
 */
export async function readTokenFile(path: string): Promise<string> {
  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new MissingConfigError(
        'RELEASE_GITHUB_TOKEN',
        `token file ${path} does not exist`,
      )
    }
    throw error
  }

  let token = content.trim()
  if (!token) {
    throw new MissingConfigError('RELEASE_GITHUB_TOKEN', `${path} is empty`)
  }
  return token
}
