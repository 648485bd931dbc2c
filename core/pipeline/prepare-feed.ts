import type { PipelineServices } from '../../types/pipeline-services'
import type { ReleaseContext } from '../../types/release-context'
import type { PipelineState } from '../../types/pipeline-state'

import { readPlistValue } from '../metadata/read-plist-value'
import { ensureMilestone } from './ensure-milestone'

/** Info.plist key holding the update feed URL. */
export const FEED_URL_KEY = 'SUFeedURL'

/**
 * Resolve the milestone and the feed URL before any stage runs, so a plan
 * ending in the feed fails before the build starts.
 *
 * @param context - Release context.
 * @param services - Pipeline services.
 * @param state - Run state receiving the milestone and feed URL.
 */
export async function prepareFeed(
  context: ReleaseContext,
  services: PipelineServices,
  state: PipelineState,
): Promise<void> {
  await ensureMilestone(context, services, state)
  state.appcastUrl ??= await readPlistValue(context.infoPlist, FEED_URL_KEY)
}
