import type { PipelineServices } from '../../types/pipeline-services'
import type { ReleaseContext } from '../../types/release-context'
import type { PipelineHooks } from '../../types/pipeline-hooks'
import type { PipelineState } from '../../types/pipeline-state'
import type { ReleaseAction } from '../../types/release-action'
import type { ReleaseStage } from '../../types/release-stage'

import { runPreflightStage } from './stages/run-preflight-stage'
import { runChecklistStage } from './stages/run-checklist-stage'
import { runArchiveStage } from './stages/run-archive-stage'
import { runBuildStage } from './stages/run-build-stage'
import { runNotesStage } from './stages/run-notes-stage'
import { runSignStage } from './stages/run-sign-stage'
import { runFeedStage } from './stages/run-feed-stage'
import { getStagePlan } from './get-stage-plan'
import { prepareFeed } from './prepare-feed'

type StageHandler = (
  context: ReleaseContext,
  services: PipelineServices,
  state: PipelineState,
) => Promise<void>

const STAGES: Record<ReleaseStage, StageHandler> = {
  checklist: runChecklistStage,
  preflight: runPreflightStage,
  archive: runArchiveStage,
  build: runBuildStage,
  notes: runNotesStage,
  sign: runSignStage,
  feed: runFeedStage,
}

/**
 * Run the stages of a command one after another.
 *
 * The first failing stage stops the run and its error propagates unchanged.
 * Advisories are collected in the returned state. Plans writing the update
 * feed resolve the milestone and the feed URL before the first stage.
 *
 * @param action - Pipeline command.
 * @param context - Release context.
 * @param services - Pipeline services.
 * @param hooks - Progress callbacks.
 * @returns Final run state.
 */
export async function runPipeline(
  action: ReleaseAction,
  context: ReleaseContext,
  services: PipelineServices,
  hooks: PipelineHooks = {},
): Promise<PipelineState> {
  let state: PipelineState = { advisories: [], files: [] }
  let plan = getStagePlan(action)

  if (plan.includes('feed')) {
    await prepareFeed(context, services, state)
  }

  for (let stage of plan) {
    let reported = state.advisories.length
    hooks.onStageStart?.(stage)
    try {
      await STAGES[stage](context, services, state)
    } catch (error) {
      hooks.onStageError?.(stage, error)
      throw error
    }
    hooks.onStageSuccess?.(stage, state.advisories.slice(reported))
  }

  return state
}
