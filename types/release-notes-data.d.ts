import type { Milestone } from './milestone'
import type { Issue } from './issue'

/** Input of the release notes templates. */
export interface ReleaseNotesData {
  /** Closed issues in presentation order. */
  issues: Issue[]

  /** Milestone the issues belong to. */
  milestone: Milestone

  /** Repository issues page, linked for bug reports. */
  issuesUrl: string

  /** Repository web URL. */
  repositoryUrl: string

  /** Product name. */
  projectName: string

  /** Release version. */
  version: string
}
