import type { PipelineServices } from '../../types/pipeline-services'
import type { ReleaseContext } from '../../types/release-context'
import type { PipelineState } from '../../types/pipeline-state'
import type { Issue } from '../../types/issue'

import { getClosedIssues } from '../release/get-closed-issues'
import { ensureMilestone } from './ensure-milestone'

/**
 * Closed issues of the run, fetched on first use.
 *
 * @param context - Release context.
 * @param services - Pipeline services.
 * @param state - Run state.
 * @returns Closed issues in presentation order.
 */
export async function ensureClosedIssues(
  context: ReleaseContext,
  services: PipelineServices,
  state: PipelineState,
): Promise<Issue[]> {
  let milestone = await ensureMilestone(context, services, state)
  state.closedIssues ??= await getClosedIssues(services.tracker, milestone)
  return state.closedIssues
}
