import type { Milestone } from '../../types/milestone'

import { MilestoneNotFoundError } from '../errors/milestone-not-found-error'

/**
 * Pick the milestone of a release.
 *
 * Milestone titles are coarser than versions ("2.1" covers "2.1.3"), so the
 * first milestone whose title is a string prefix of the version wins. There
 * is no delimiter check: "2.1" also matches "2.10.0".
 *
 * @param version - Release version.
 * @param milestones - Milestones in tracker order.
 * @returns Matching milestone.
 */
export function resolveMilestone(
  version: string,
  milestones: Milestone[],
): Milestone {
  let milestone = milestones.find(({ title }) => version.startsWith(title))
  if (!milestone) {
    throw new MilestoneNotFoundError(
      version,
      milestones.map(({ title }) => title),
    )
  }
  return milestone
}
