import type { ReleaseAction } from '../../types/release-action'
import type { ReleaseStage } from '../../types/release-stage'

/** Stages each command runs, in order. */
const STAGE_PLANS: Record<ReleaseAction, readonly ReleaseStage[]> = {
  release: [
    'preflight',
    'build',
    'archive',
    'sign',
    'notes',
    'feed',
    'checklist',
  ],
  appcast: ['build', 'archive', 'sign', 'notes', 'feed'],
  archive: ['build', 'archive'],
  'release-notes': ['notes'],
  build: ['build'],
}

/**
 * Ordered stages of a command.
 *
 * @param action - Pipeline command.
 * @returns Stage plan.
 */
export function getStagePlan(action: ReleaseAction): readonly ReleaseStage[] {
  return STAGE_PLANS[action]
}
