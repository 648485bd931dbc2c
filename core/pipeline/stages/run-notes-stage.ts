import { writeFile, mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'

import type { PipelineServices } from '../../../types/pipeline-services'
import type { ReleaseContext } from '../../../types/release-context'
import type { PipelineState } from '../../../types/pipeline-state'

import { renderReleaseNotes } from '../../render/render-release-notes'
import { getReleaseNotesData } from '../get-release-notes-data'

/**
 * Write the HTML release notes of the version.
 *
 * @param context - Release context.
 * @param services - Pipeline services.
 * @param state - Run state.
 */
export async function runNotesStage(
  context: ReleaseContext,
  services: PipelineServices,
  state: PipelineState,
): Promise<void> {
  let data = await getReleaseNotesData(context, services, state)
  let html = renderReleaseNotes('html', data)

  await mkdir(dirname(context.releaseNotesFile), { recursive: true })
  await writeFile(context.releaseNotesFile, html, 'utf8')
  state.files.push(context.releaseNotesFile)
}
