import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { mkdtemp, writeFile, rm } from 'node:fs/promises'
import { tmpdir, homedir } from 'node:os'
import { join } from 'node:path'

import { loadReleaseConfig } from '../../core/config/load-release-config'
import { MissingConfigError } from '../../core/errors/missing-config-error'
import { InvalidConfigError } from '../../core/errors/invalid-config-error'

let environment = {
  RELEASE_GITHUB_USER: 'octo',
  RELEASE_GITHUB_REPO: 'shiftit',
}

describe('loadReleaseConfig', () => {
  let root: string

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'load-release-config-'))
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('derives defaults from the project name', async () => {
    await writeFile(join(root, 'release.config.yml'), 'name: ShiftIt\n')

    await expect(loadReleaseConfig(root, environment)).resolves.toEqual({
      releaseNotesBaseUrl:
        'http://htmlpreview.github.com/?https://raw.github.com/octo/shiftit/master/release',
      tokenFile: join(homedir(), 'Keys', 'ShiftIt', 'github.token'),
      signTool: join(root, 'ShiftIt', 'bin', 'sign_update'),
      infoPlist: join(root, 'ShiftIt', 'ShiftIt-Info.plist'),
      repositoryUrl: 'https://github.com/octo/shiftit',
      sourceDir: join(root, 'ShiftIt'),
      minimumSystemVersion: '14.6',
      githubRepo: 'shiftit',
      githubUser: 'octo',
      name: 'ShiftIt',
      root,
    })
  })

  it('applies file settings and environment overrides', async () => {
    await writeFile(
      join(root, 'release.config.yml'),
      [
        'name: ShiftIt',
        'sourceDir: app',
        'infoPlist: Info.plist',
        'repositoryUrl: https://example.test/shiftit/',
        'minimumSystemVersion: 13.0',
        '',
      ].join('\n'),
    )

    let config = await loadReleaseConfig(root, {
      ...environment,
      RELEASE_GITHUB_TOKEN: 'keys/github.token.gpg',
      RELEASE_SIGN_UPDATE: '/opt/sparkle/sign_update',
    })

    expect(config.sourceDir).toBe(join(root, 'app'))
    expect(config.infoPlist).toBe(join(root, 'app', 'Info.plist'))
    expect(config.repositoryUrl).toBe('https://example.test/shiftit')
    expect(config.minimumSystemVersion).toBe('13')
    expect(config.tokenFile).toBe(join(root, 'keys', 'github.token.gpg'))
    expect(config.signTool).toBe('/opt/sparkle/sign_update')
  })

  it('keeps a quoted minimum system version as written', async () => {
    await writeFile(
      join(root, 'release.config.yml'),
      'name: ShiftIt\nminimumSystemVersion: "13.0"\n',
    )

    let config = await loadReleaseConfig(root, environment)

    expect(config.minimumSystemVersion).toBe('13.0')
  })

  it('requires the repository coordinates', async () => {
    await writeFile(join(root, 'release.config.yml'), 'name: ShiftIt\n')

    await expect(
      loadReleaseConfig(root, { RELEASE_GITHUB_USER: 'octo' }),
    ).rejects.toThrowError(
      'Missing configuration "RELEASE_GITHUB_REPO": set it in the environment',
    )
    await expect(
      loadReleaseConfig(root, { ...environment, RELEASE_GITHUB_USER: ' ' }),
    ).rejects.toThrowError(MissingConfigError)
  })

  it('rejects a missing configuration file', async () => {
    await expect(loadReleaseConfig(root, environment)).rejects.toThrowError(
      `Missing configuration "name": ${join(root, 'release.config.yml')} does not exist`,
    )
  })

  it('rejects a file without a project name', async () => {
    await writeFile(join(root, 'release.config.yml'), 'sourceDir: app\n')

    await expect(loadReleaseConfig(root, environment)).rejects.toThrowError(
      InvalidConfigError,
    )
  })

  it('rejects malformed YAML', async () => {
    await writeFile(join(root, 'release.config.yml'), 'name: [ShiftIt\n')

    await expect(loadReleaseConfig(root, environment)).rejects.toThrowError(
      InvalidConfigError,
    )
  })
})
