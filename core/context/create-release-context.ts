import { join } from 'node:path'

import type { ReleaseContext } from '../../types/release-context'
import type { ReleaseConfig } from '../../types/release-config'

import { getDownloadUrl } from './get-download-url'
import { getArchiveName } from './get-archive-name'

/**
 * Derive every path and URL of a release from the configuration and version.
 *
 * @param config - Resolved configuration.
 * @param version - Release version.
 * @returns Frozen release context.
 */
export function createReleaseContext(
  config: ReleaseConfig,
  version: string,
): ReleaseContext {
  let { repositoryUrl, sourceDir, root, name } = config

  let buildDir = join(root, 'build')
  let appPath = join(sourceDir, 'build', 'Release', `${name}.app`)
  let archiveName = getArchiveName(name, version)
  let archivePath = join(buildDir, archiveName)
  let downloadUrl = getDownloadUrl(
    `${repositoryUrl}/releases/download`,
    version,
    archiveName,
  )
  let releaseNotesUrl = `${config.releaseNotesBaseUrl}/release-notes-${version}.html`
  let releaseNotesFile = join(root, 'release', `release-notes-${version}.html`)
  let appcastFile = join(root, 'release', 'appcast.xml')

  let info = [
    { label: 'name', value: name },
    { label: 'version', value: version },
    { label: 'src_dir', value: sourceDir },
    { label: 'build_dir', value: buildDir },
    { label: 'app_dir', value: appPath },
    { label: 'info_plist', value: config.infoPlist },
    { label: 'archive_name', value: archiveName },
    { label: 'archive_path', value: archivePath },
    { label: 'download_url', value: downloadUrl },
    { label: 'release_notes_url', value: releaseNotesUrl },
    { label: 'release_notes_html_file', value: releaseNotesFile },
    { label: 'appcast_file', value: appcastFile },
    { label: 'github_token_file', value: config.tokenFile },
    { label: 'sign_update_tool', value: config.signTool },
  ].map(entry => Object.freeze(entry))

  return Object.freeze({
    minimumSystemVersion: config.minimumSystemVersion,
    milestonesUrl: `${repositoryUrl}/milestones`,
    releasesUrl: `${repositoryUrl}/releases`,
    issuesUrl: `${repositoryUrl}/issues`,
    infoPlist: config.infoPlist,
    signTool: config.signTool,
    info: Object.freeze(info),
    releaseNotesFile,
    releaseNotesUrl,
    repositoryUrl,
    archiveName,
    archivePath,
    appcastFile,
    downloadUrl,
    sourceDir,
    buildDir,
    version,
    appPath,
    root,
    name,
  })
}
