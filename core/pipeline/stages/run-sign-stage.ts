import { stat } from 'node:fs/promises'

import type { PipelineServices } from '../../../types/pipeline-services'
import type { ReleaseContext } from '../../../types/release-context'
import type { PipelineState } from '../../../types/pipeline-state'

import { signArtifact } from '../../signing/sign-artifact'

/**
 * Sign the release archive and record its signature and size.
 *
 * @param context - Release context.
 * @param services - Pipeline services.
 * @param state - Run state.
 */
export async function runSignStage(
  context: ReleaseContext,
  services: PipelineServices,
  state: PipelineState,
): Promise<void> {
  state.signature = await signArtifact(
    services.runner,
    context.signTool,
    context.archivePath,
  )
  state.archiveSize = (await stat(context.archivePath)).size
}
