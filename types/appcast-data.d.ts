/** Input of the update feed template. */
export interface AppcastData {
  /** Minimum macOS version able to install the update. */
  minimumSystemVersion: string

  /** Public URL of the HTML release notes. */
  releaseNotesUrl: string

  /** Archive size in bytes. */
  downloadSize: number

  /** Archive download URL. */
  downloadUrl: string

  /** Feed URL declared by the application. */
  appcastUrl: string

  /** Product name. */
  projectName: string

  /** Opaque signature of the archive. */
  signature: string

  /** Release version. */
  version: string

  /** Publication date. */
  date: Date
}
