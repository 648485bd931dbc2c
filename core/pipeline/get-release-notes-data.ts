import type { ReleaseNotesData } from '../../types/release-notes-data'
import type { PipelineServices } from '../../types/pipeline-services'
import type { ReleaseContext } from '../../types/release-context'
import type { PipelineState } from '../../types/pipeline-state'

import { ensureClosedIssues } from './ensure-closed-issues'
import { ensureMilestone } from './ensure-milestone'

/**
 * Collect the data of the release notes templates.
 *
 * @param context - Release context.
 * @param services - Pipeline services.
 * @param state - Run state.
 * @returns Release notes data.
 */
export async function getReleaseNotesData(
  context: ReleaseContext,
  services: PipelineServices,
  state: PipelineState,
): Promise<ReleaseNotesData> {
  let milestone = await ensureMilestone(context, services, state)
  let issues = await ensureClosedIssues(context, services, state)

  return {
    repositoryUrl: context.repositoryUrl,
    issuesUrl: context.issuesUrl,
    projectName: context.name,
    version: context.version,
    milestone,
    issues,
  }
}
