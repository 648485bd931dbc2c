import type { TrackerClient } from '../../types/tracker-client'
import type { Milestone } from '../../types/milestone'

import { resolveMilestone } from './resolve-milestone'

/**
 * Fetch the open milestones and pick the one matching the version.
 *
 * @param tracker - Issue tracker.
 * @param version - Release version.
 * @returns Matching milestone.
 */
export async function findMilestone(
  tracker: TrackerClient,
  version: string,
): Promise<Milestone> {
  let milestones = await tracker.getMilestones('open')
  return resolveMilestone(version, milestones)
}
