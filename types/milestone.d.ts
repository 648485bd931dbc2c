/** Tracker milestone grouping the issues of a release. */
export interface Milestone {
  /** Milestone title, compared as a prefix of the release version. */
  title: string

  /** Numeric milestone identifier. */
  number: number

  /** Web URL of the milestone. */
  url: string
}
