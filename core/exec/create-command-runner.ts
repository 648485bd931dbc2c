import type { CommandRunner } from '../../types/command-runner'

import { runCommand } from './run-command'

/**
 * Create the command runner backed by real child processes.
 *
 * @returns Runner delegating to runCommand.
 */
export function createCommandRunner(): CommandRunner {
  return {
    run: (command, args, options) => runCommand(command, args, options),
  }
}
