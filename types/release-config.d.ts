/** Fully resolved configuration with absolute paths and defaults applied. */
export interface ReleaseConfig {
  /** Base URL release notes are published under (no trailing slash). */
  releaseNotesBaseUrl: string

  /** Minimum macOS version announced in the update feed. */
  minimumSystemVersion: string

  /** Public web URL of the repository (no trailing slash). */
  repositoryUrl: string

  /** Account that owns the tracker repository. */
  githubUser: string

  /** Tracker repository name. */
  githubRepo: string

  /** Path of the plaintext or `.gpg` encrypted API token. */
  tokenFile: string

  /** Absolute path of the Info.plist descriptor. */
  infoPlist: string

  /** Absolute path of the Xcode project directory. */
  sourceDir: string

  /** Path of the signing tool executable. */
  signTool: string

  /** Absolute project root. */
  root: string

  /** Product name. */
  name: string
}
