import type { TrackerClientContext } from '../../types/tracker-client-context'
import type { IssueState } from '../../types/issue-state'
import type { Milestone } from '../../types/milestone'

import { isMilestonePayload } from '../schema/tracker/is-milestone-payload'
import { getAllPages } from './get-all-pages'

/**
 * List repository milestones in API order.
 *
 * @param context - Client context.
 * @param state - Milestone state filter.
 * @returns Milestones.
 */
export async function getMilestones(
  context: TrackerClientContext,
  state: IssueState = 'open',
): Promise<Milestone[]> {
  let { owner, repo } = context
  let items = await getAllPages(context, `/repos/${owner}/${repo}/milestones`, {
    state,
  })

  return items.filter(isMilestonePayload).map(milestone => ({
    number: milestone.number,
    title: milestone.title,
    url: milestone.html_url,
  }))
}
