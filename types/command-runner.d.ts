import type { RunCommandOptions } from './run-command-options'
import type { CommandResult } from './command-result'

/**
 * Single entry point for every external tool the release relies on (build,
 * compression, decryption, signing, metadata queries and git).
 */
export interface CommandRunner {
  /** Run a command to completion and capture its output. */
  run(
    command: string,
    args: string[],
    options?: RunCommandOptions,
  ): Promise<CommandResult>
}
