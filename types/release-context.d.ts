import type { InfoEntry } from './info-entry'

/** Everything derived from the configuration and the current version. */
export interface ReleaseContext {
  /** Ordered entries for the `info` command. */
  readonly info: readonly InfoEntry[]

  /** Minimum macOS version announced in the update feed. */
  readonly minimumSystemVersion: string

  /** Where the HTML release notes are written. */
  readonly releaseNotesFile: string

  /** Public URL of the HTML release notes. */
  readonly releaseNotesUrl: string

  /** Public web URL of the repository. */
  readonly repositoryUrl: string

  /** Repository milestones page. */
  readonly milestonesUrl: string

  /** Repository releases page. */
  readonly releasesUrl: string

  /** Public URL the archive is downloaded from. */
  readonly downloadUrl: string

  /** Repository issues page. */
  readonly issuesUrl: string

  /** File name of the zip archive. */
  readonly archiveName: string

  /** Where the zip archive is written. */
  readonly archivePath: string

  /** Where the update feed is written. */
  readonly appcastFile: string

  /** Absolute path of the Info.plist descriptor. */
  readonly infoPlist: string

  /** Directory with the Xcode project. */
  readonly sourceDir: string

  /** Directory receiving the archive. */
  readonly buildDir: string

  /** Signing tool executable. */
  readonly signTool: string

  /** Built application bundle. */
  readonly appPath: string

  /** Release version read from the bundle. */
  readonly version: string

  /** Project root. */
  readonly root: string

  /** Product name. */
  readonly name: string
}
