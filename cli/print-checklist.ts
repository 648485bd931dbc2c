import pc from 'picocolors'

import type { ReleaseChecklist } from '../types/release-checklist'

/** Width of the separator lines. */
const RULE_WIDTH = 100

/**
 * Prints the manual steps left to publish the release, followed by the
 * values to enter in the release draft.
 *
 * @param checklist - Release checklist.
 */
export function printChecklist(checklist: ReleaseChecklist): void {
  console.info('')
  console.info('='.repeat(RULE_WIDTH))
  for (let [index, step] of checklist.steps.entries()) {
    console.info(pc.green(`${index + 1}. ${step.title}`))
    if (step.detail) {
      console.info(step.detail)
    }
  }
  console.info('-'.repeat(RULE_WIDTH))
  console.info(`tag: ${checklist.tag}`)
  console.info(`title: ${checklist.title}`)
  console.info('description:')
  console.info(checklist.description)
  console.info('-'.repeat(RULE_WIDTH))
}
