/** Commands that run the release pipeline. */
export type ReleaseAction =
  | 'release-notes'
  | 'appcast'
  | 'archive'
  | 'release'
  | 'build'
