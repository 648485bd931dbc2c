import type { TrackerClientContext } from '../../types/tracker-client-context'
import type { IssueState } from '../../types/issue-state'
import type { Issue } from '../../types/issue'

import { isIssuePayload } from '../schema/tracker/is-issue-payload'
import { getAllPages } from './get-all-pages'

/**
 * List the issues of a milestone in API order.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.milestone - Milestone number.
 * @param parameters.state - Issue state filter.
 * @returns Issues.
 */
export async function getMilestoneIssues(
  context: TrackerClientContext,
  parameters: { milestone: number; state: IssueState },
): Promise<Issue[]> {
  let { owner, repo } = context
  let items = await getAllPages(context, `/repos/${owner}/${repo}/issues`, {
    milestone: String(parameters.milestone),
    state: parameters.state,
  })

  return items.filter(isIssuePayload).map(issue => ({
    closedAt: issue.closed_at ? new Date(issue.closed_at) : null,
    number: issue.number,
    url: issue.html_url,
    title: issue.title,
  }))
}
