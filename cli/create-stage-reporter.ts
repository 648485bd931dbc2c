import { createSpinner } from 'nanospinner'

import type { PipelineHooks } from '../types/pipeline-hooks'
import type { ReleaseStage } from '../types/release-stage'

import { printAdvisories } from './print-advisories'

/** Spinner text of each stage. */
export const STAGE_LABELS: Record<ReleaseStage, string> = {
  checklist: 'Preparing release checklist',
  preflight: 'Running pre-flight checks',
  notes: 'Writing release notes',
  feed: 'Writing update feed',
  build: 'Building application',
  archive: 'Archiving build',
  sign: 'Signing archive',
}

/**
 * Creates pipeline hooks showing one spinner per stage.
 *
 * @returns Pipeline hooks.
 */
export function createStageReporter(): PipelineHooks {
  let spinner: ReturnType<typeof createSpinner> | undefined
  let pluralRules = new Intl.PluralRules('en-US', { type: 'cardinal' })

  return {
    onStageSuccess: (stage, advisories) => {
      if (advisories.length === 0) {
        spinner?.success()
        return
      }

      let noun =
        pluralRules.select(advisories.length) === 'one' ? 'warning' : 'warnings'
      spinner?.warn(`${STAGE_LABELS[stage]} (${advisories.length} ${noun})`)
      printAdvisories(advisories)
    },
    onStageStart: stage => {
      spinner = createSpinner(STAGE_LABELS[stage]).start()
    },
    onStageError: stage => {
      spinner?.error(`${STAGE_LABELS[stage]} failed`)
    },
  }
}
