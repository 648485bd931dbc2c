/** Steps of the release pipeline. */
export type ReleaseStage =
  | 'checklist'
  | 'preflight'
  | 'archive'
  | 'build'
  | 'notes'
  | 'feed'
  | 'sign'
