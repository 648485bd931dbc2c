import type { ReleaseChecklist } from './release-checklist'
import type { Milestone } from './milestone'
import type { Advisory } from './advisory'
import type { Issue } from './issue'

/** Data handed from one stage to the next during a single run. */
export interface PipelineState {
  /** Checklist produced by the final stage of `release`. */
  checklist?: ReleaseChecklist

  /** Closed issues of the milestone, in presentation order. */
  closedIssues?: Issue[]

  /** Advisory conditions found so far. */
  advisories: Advisory[]

  /** Milestone matching the version. */
  milestone?: Milestone

  /** Feed URL read from the info plist. */
  appcastUrl?: string

  /** Archive size in bytes, set by the sign stage. */
  archiveSize?: number

  /** Archive signature, set by the sign stage. */
  signature?: string

  /** Documents written by the run. */
  files: string[]
}
