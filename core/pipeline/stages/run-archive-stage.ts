import { mkdir } from 'node:fs/promises'

import type { PipelineServices } from '../../../types/pipeline-services'
import type { ReleaseContext } from '../../../types/release-context'

/**
 * Compress the built application bundle into the release archive.
 *
 * @param context - Release context.
 * @param services - Pipeline services.
 */
export async function runArchiveStage(
  context: ReleaseContext,
  services: PipelineServices,
): Promise<void> {
  await mkdir(context.buildDir, { recursive: true })
  await services.runner.run('ditto', [
    '-ck',
    '--keepParent',
    context.appPath,
    context.archivePath,
  ])
}
