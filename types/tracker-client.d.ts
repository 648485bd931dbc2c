import type { IssueState } from './issue-state'
import type { Milestone } from './milestone'
import type { Issue } from './issue'

/** Read-only view of the issue tracker used by the release. */
export interface TrackerClient {
  /** List the issues attached to a milestone, in tracker order. */
  getMilestoneIssues(milestone: number, state: IssueState): Promise<Issue[]>

  /** List milestones in tracker order. */
  getMilestones(state?: IssueState): Promise<Milestone[]>
}
