import type { PipelineServices } from '../../../types/pipeline-services'
import type { ReleaseContext } from '../../../types/release-context'
import type { PipelineState } from '../../../types/pipeline-state'

import { checkWorkingTree } from '../check-working-tree'
import { getOpenIssues } from '../../release/get-open-issues'
import { ensureMilestone } from '../ensure-milestone'

/**
 * Report pending changes and issues still open on the milestone. Findings
 * are advisories and never stop the release.
 *
 * @param context - Release context.
 * @param services - Pipeline services.
 * @param state - Run state.
 */
export async function runPreflightStage(
  context: ReleaseContext,
  services: PipelineServices,
  state: PipelineState,
): Promise<void> {
  let workingTree = await checkWorkingTree(services.runner, context.root)
  if (workingTree) {
    state.advisories.push(workingTree)
  }

  let milestone = await ensureMilestone(context, services, state)
  let openIssues = await getOpenIssues(services.tracker, milestone)
  if (openIssues.length > 0) {
    state.advisories.push({
      details: openIssues.map(issue => `#${issue.number}: ${issue.title}`),
      message: 'There are still open issues',
      stage: 'preflight',
    })
  }
}
