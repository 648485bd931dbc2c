import type { PipelineServices } from '../../../types/pipeline-services'
import type { ReleaseContext } from '../../../types/release-context'

/**
 * Build the Release configuration of the application target.
 *
 * @param context - Release context.
 * @param services - Pipeline services.
 */
export async function runBuildStage(
  context: ReleaseContext,
  services: PipelineServices,
): Promise<void> {
  await services.runner.run(
    'xcodebuild',
    ['-target', context.name, '-configuration', 'Release'],
    { cwd: context.sourceDir },
  )
}
