import type { Milestone } from '../../types/milestone'

/**
 * Build the link to the issue list of a milestone.
 *
 * @param repositoryUrl - Public web URL of the repository.
 * @param milestone - Release milestone.
 * @returns Milestone issues URL.
 */
export function getMilestoneUrl(
  repositoryUrl: string,
  milestone: Milestone,
): string {
  return `${repositoryUrl}/issues?milestone=${milestone.number}`
}
