import { writeFile, mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'

import type { PipelineServices } from '../../../types/pipeline-services'
import type { ReleaseContext } from '../../../types/release-context'
import type { PipelineState } from '../../../types/pipeline-state'

import { ReleaseError } from '../../errors/release-error'
import { renderAppcast } from '../../render/render-appcast'
import { prepareFeed } from '../prepare-feed'

/**
 * Write the update feed announcing the signed archive.
 *
 * @param context - Release context.
 * @param services - Pipeline services.
 * @param state - Run state.
 */
export async function runFeedStage(
  context: ReleaseContext,
  services: PipelineServices,
  state: PipelineState,
): Promise<void> {
  let { archiveSize, signature } = state
  if (signature === undefined || archiveSize === undefined) {
    throw new ReleaseError('The update feed requires a signed archive')
  }

  await prepareFeed(context, services, state)
  let { appcastUrl } = state
  if (appcastUrl === undefined) {
    throw new ReleaseError('The update feed requires a feed URL')
  }

  let xml = renderAppcast({
    minimumSystemVersion: context.minimumSystemVersion,
    releaseNotesUrl: context.releaseNotesUrl,
    downloadUrl: context.downloadUrl,
    downloadSize: archiveSize,
    projectName: context.name,
    version: context.version,
    date: services.now(),
    appcastUrl,
    signature,
  })

  await mkdir(dirname(context.appcastFile), { recursive: true })
  await writeFile(context.appcastFile, xml, 'utf8')
  state.files.push(context.appcastFile)
}
