import type { TrackerClient } from '../../types/tracker-client'
import type { Milestone } from '../../types/milestone'
import type { Issue } from '../../types/issue'

/**
 * Fetch the issues still open on a milestone.
 *
 * @param tracker - Issue tracker.
 * @param milestone - Release milestone.
 * @returns Open issues in tracker order.
 */
export function getOpenIssues(
  tracker: TrackerClient,
  milestone: Milestone,
): Promise<Issue[]> {
  return tracker.getMilestoneIssues(milestone.number, 'open')
}
