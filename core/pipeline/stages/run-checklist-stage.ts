import type { PipelineServices } from '../../../types/pipeline-services'
import type { ReleaseContext } from '../../../types/release-context'
import type { PipelineState } from '../../../types/pipeline-state'

import { renderReleaseNotes } from '../../render/render-release-notes'
import { getReleaseNotesData } from '../get-release-notes-data'
import { buildChecklist } from '../build-checklist'

/**
 * Prepare the manual publishing checklist. Nothing is changed on disk or in
 * the tracker.
 *
 * @param context - Release context.
 * @param services - Pipeline services.
 * @param state - Run state.
 */
export async function runChecklistStage(
  context: ReleaseContext,
  services: PipelineServices,
  state: PipelineState,
): Promise<void> {
  let data = await getReleaseNotesData(context, services, state)
  state.checklist = buildChecklist(
    context,
    renderReleaseNotes('markdown', data),
  )
}
