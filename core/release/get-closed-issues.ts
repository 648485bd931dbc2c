import type { TrackerClient } from '../../types/tracker-client'
import type { Milestone } from '../../types/milestone'
import type { Issue } from '../../types/issue'

import { sortByClosedAt } from './sort-by-closed-at'

/**
 * Fetch the closed issues of a milestone in release-notes order.
 *
 * @param tracker - Issue tracker.
 * @param milestone - Release milestone.
 * @returns Closed issues, earliest closed first; empty when none.
 */
export async function getClosedIssues(
  tracker: TrackerClient,
  milestone: Milestone,
): Promise<Issue[]> {
  let issues = await tracker.getMilestoneIssues(milestone.number, 'closed')
  return sortByClosedAt(issues)
}
