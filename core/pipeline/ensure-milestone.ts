import type { PipelineServices } from '../../types/pipeline-services'
import type { ReleaseContext } from '../../types/release-context'
import type { PipelineState } from '../../types/pipeline-state'
import type { Milestone } from '../../types/milestone'

import { findMilestone } from '../release/find-milestone'

/**
 * Milestone of the run, fetched on first use.
 *
 * @param context - Release context.
 * @param services - Pipeline services.
 * @param state - Run state.
 * @returns Release milestone.
 */
export async function ensureMilestone(
  context: ReleaseContext,
  services: PipelineServices,
  state: PipelineState,
): Promise<Milestone> {
  state.milestone ??= await findMilestone(services.tracker, context.version)
  return state.milestone
}
