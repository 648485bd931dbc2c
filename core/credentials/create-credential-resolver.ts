import { mkdtemp, writeFile, rm } from 'node:fs/promises'
import { basename, join } from 'node:path'
import { rmSync } from 'node:fs'
import { tmpdir } from 'node:os'

import type { DecryptedCredential } from '../../types/decrypted-credential'
import type { CredentialResolver } from '../../types/credential-resolver'
import type { CommandRunner } from '../../types/command-runner'
import type { CommandResult } from '../../types/command-result'

import { DecryptionUnavailableError } from '../errors/decryption-unavailable-error'
import { CommandNotFoundError } from '../errors/command-not-found-error'

/** Suffix marking a gpg encrypted credential. */
export const ENCRYPTED_SUFFIX = '.gpg'

/**
 * Create a credential resolver owning a cache of decrypted files.
 *
 * The cache holds the in-flight decryption for each source path, so repeated
 * or concurrent resolution of one path runs gpg exactly once. Temporary files
 * stay on disk until `dispose` or `disposeSync` is called.
 *
 * @param runner - Runner used to invoke gpg.
 * @returns Credential resolver.
 */
export function createCredentialResolver(
  runner: CommandRunner,
): CredentialResolver {
  let credentials = new Map<string, Promise<DecryptedCredential>>()
  let directories = new Set<string>()

  async function decrypt(source: string): Promise<DecryptedCredential> {
    let result: CommandResult
    try {
      result = await runner.run('gpg', ['--decrypt', source])
    } catch (error) {
      if (error instanceof CommandNotFoundError) {
        throw new DecryptionUnavailableError(source)
      }
      throw error
    }

    let directory = await mkdtemp(join(tmpdir(), 'desktop-release-'))
    directories.add(directory)
    let path = join(directory, basename(source, ENCRYPTED_SUFFIX))
    try {
      await writeFile(path, result.output, { mode: 0o600 })
    } catch (error) {
      directories.delete(directory)
      await rm(directory, { recursive: true, force: true })
      throw error
    }

    return { directory, source, path }
  }

  return {
    resolve: async path => {
      if (!path.endsWith(ENCRYPTED_SUFFIX)) {
        return path
      }

      let credential = credentials.get(path)
      if (!credential) {
        credential = decrypt(path)
        credentials.set(path, credential)
      }

      return (await credential).path
    },
    dispose: async () => {
      let settled = await Promise.allSettled(credentials.values())
      credentials.clear()

      await Promise.all(
        settled.map(outcome =>
          outcome.status === 'fulfilled'
            ? rm(outcome.value.directory, { recursive: true, force: true })
            : Promise.resolve(),
        ),
      )
      directories.clear()
    },
    disposeSync: () => {
      for (let directory of directories) {
        rmSync(directory, { recursive: true, force: true })
      }
      directories.clear()
      credentials.clear()
    },
  }
}
