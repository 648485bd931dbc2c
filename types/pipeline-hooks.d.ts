import type { ReleaseStage } from './release-stage'
import type { Advisory } from './advisory'

/** Progress callbacks of a pipeline run. */
export interface PipelineHooks {
  /** Called after a stage completes with the advisories it raised. */
  onStageSuccess?(stage: ReleaseStage, advisories: Advisory[]): void

  /** Called when a stage fails, before the error propagates. */
  onStageError?(stage: ReleaseStage, error: unknown): void

  /** Called before a stage starts. */
  onStageStart?(stage: ReleaseStage): void
}
