/** Tracker issue as used by the release notes. */
export interface Issue {
  /** When the issue was closed, null for open issues. */
  closedAt: Date | null

  /** Issue number. */
  number: number

  /** Issue title. */
  title: string

  /** Web URL of the issue. */
  url: string
}
