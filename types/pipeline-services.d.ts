import type { CommandRunner } from './command-runner'
import type { TrackerClient } from './tracker-client'

/** Collaborators the pipeline stages delegate to. */
export interface PipelineServices {
  /** Issue tracker. */
  tracker: TrackerClient

  /** External tools. */
  runner: CommandRunner

  /** Clock used for the feed publication date. */
  now(): Date
}
