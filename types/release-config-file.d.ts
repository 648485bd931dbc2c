/** Shape of `release.config.yml`. */
export interface ReleaseConfigFile {
  /** Base URL release notes are published under. */
  releaseNotesBaseUrl?: string

  /** Minimum macOS version announced in the update feed. */
  minimumSystemVersion?: string | number

  /** Public web URL of the repository. */
  repositoryUrl?: string

  /** Info plist file name, relative to the source directory. */
  infoPlist?: string

  /** Directory with the Xcode project, relative to the project root. */
  sourceDir?: string

  /** Product name (also the Xcode target and the app bundle name). */
  name: string
}
