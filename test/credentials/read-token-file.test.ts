import { mkdtemp, writeFile, rm } from 'node:fs/promises'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { readTokenFile } from '../../core/credentials/read-token-file'
import { MissingConfigError } from '../../core/errors/missing-config-error'

describe('readTokenFile', () => {
  let directory: string

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'read-token-file-'))
  })

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true })
  })

  it('returns the trimmed token', async () => {
    let path = join(directory, 'github.token')
    await writeFile(path, '  test-token\n')

    await expect(readTokenFile(path)).resolves.toBe('test-token')
  })

  it('rejects a missing file', async () => {
    let path = join(directory, 'missing.token')

    await expect(readTokenFile(path)).rejects.toThrowError(
      `Missing configuration "RELEASE_GITHUB_TOKEN": token file ${path} does not exist`,
    )
  })

  it('rejects an empty file', async () => {
    let path = join(directory, 'github.token')
    await writeFile(path, '\n')

    await expect(readTokenFile(path)).rejects.toThrowError(MissingConfigError)
    await expect(readTokenFile(path)).rejects.toThrowError(
      `Missing configuration "RELEASE_GITHUB_TOKEN": ${path} is empty`,
    )
  })
})
