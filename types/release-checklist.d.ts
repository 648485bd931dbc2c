/** Manual steps left after the automated part of the release. */
export interface ReleaseChecklist {
  /** Ordered steps with an optional detail line. */
  steps: { detail?: string; title: string }[]

  /** Markdown release notes for the release description. */
  description: string

  /** Git tag of the release. */
  tag: string

  /** Release title. */
  title: string
}
