import { resolve, join } from 'node:path'
import { readFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { parseDocument } from 'yaml'

import type { ReleaseConfigFile } from '../../types/release-config-file'
import type { ReleaseConfig } from '../../types/release-config'

import { isReleaseConfigFile } from '../schema/config/is-release-config-file'
import { MissingConfigError } from '../errors/missing-config-error'
import { InvalidConfigError } from '../errors/invalid-config-error'
import { requireEnvironment } from './require-environment'

/** Project configuration file name. */
export const CONFIG_FILE_NAME = 'release.config.yml'

/** Minimum macOS version announced when the project does not set one. */
export const DEFAULT_MINIMUM_SYSTEM_VERSION = '14.6'

/**
 * Load the release configuration from `release.config.yml` and the
 * environment.
 *
 * Environment:
 *
 * - `RELEASE_GITHUB_USER` (required): owner of the tracker repository.
 * - `RELEASE_GITHUB_REPO` (required): tracker repository name.
 * - `RELEASE_GITHUB_TOKEN`: token file, plaintext or `.gpg`.
 * - `RELEASE_SIGN_UPDATE`: signing tool executable.
 *
 * @param root - Project root.
 * @param environment - Environment variables.
 * @returns Resolved configuration.
 */
export async function loadReleaseConfig(
  root: string,
  environment: NodeJS.ProcessEnv = process.env,
): Promise<ReleaseConfig> {
  let projectRoot = resolve(root)
  let file = await readConfigFile(join(projectRoot, CONFIG_FILE_NAME))

  let githubUser = requireEnvironment(environment, 'RELEASE_GITHUB_USER')
  let githubRepo = requireEnvironment(environment, 'RELEASE_GITHUB_REPO')

  let { name } = file
  let sourceDir = resolve(projectRoot, file.sourceDir ?? name)
  let infoPlist = resolve(sourceDir, file.infoPlist ?? `${name}-Info.plist`)
  let repositoryUrl = trimTrailingSlash(
    file.repositoryUrl ?? `https://github.com/${githubUser}/${githubRepo}`,
  )
  let releaseNotesBaseUrl = trimTrailingSlash(
    file.releaseNotesBaseUrl ??
      `http://htmlpreview.github.com/?https://raw.github.com/${githubUser}/${githubRepo}/master/release`,
  )

  let tokenFile = resolve(
    projectRoot,
    expandHome(
      environment['RELEASE_GITHUB_TOKEN']?.trim() ||
        join('~', 'Keys', name, 'github.token'),
    ),
  )
  let signTool =
    environment['RELEASE_SIGN_UPDATE']?.trim() ||
    join(sourceDir, 'bin', 'sign_update')

  return {
    minimumSystemVersion: String(
      file.minimumSystemVersion ?? DEFAULT_MINIMUM_SYSTEM_VERSION,
    ),
    signTool: resolve(projectRoot, signTool),
    releaseNotesBaseUrl,
    root: projectRoot,
    repositoryUrl,
    githubUser,
    githubRepo,
    infoPlist,
    sourceDir,
    tokenFile,
    name,
  }
}

async function readConfigFile(path: string): Promise<ReleaseConfigFile> {
  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new MissingConfigError('name', `${path} does not exist`)
    }
    throw error
  }

  let document = parseDocument(content)
  let [firstError] = document.errors
  if (firstError) {
    throw new InvalidConfigError(path, firstError.message)
  }

  let value: unknown = document.toJSON()
  if (!isReleaseConfigFile(value)) {
    throw new InvalidConfigError(
      path,
      'expected a mapping with a "name" and string values',
    )
  }
  return value
}

function expandHome(path: string): string {
  if (path === '~' || path.startsWith('~/')) {
    return join(homedir(), path.slice(1))
  }
  return path
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/u, '')
}
