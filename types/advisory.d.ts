import type { ReleaseStage } from './release-stage'

/** Reported condition that does not stop the release. */
export interface Advisory {
  /** Stage that detected the condition. */
  stage: ReleaseStage

  /** Extra lines, such as the offending issues. */
  details: string[]

  /** One-line summary. */
  message: string
}
