import type { CommandRunner } from '../../types/command-runner'
import type { CommandResult } from '../../types/command-result'
import type { Advisory } from '../../types/advisory'

import { CommandNotFoundError } from '../errors/command-not-found-error'

/**
 * Look for uncommitted changes to tracked files.
 *
 * @param runner - Command runner.
 * @param root - Repository root.
 * @returns Advisory when the tree is dirty or cannot be checked, else null.
 */
export async function checkWorkingTree(
  runner: CommandRunner,
  root: string,
): Promise<Advisory | null> {
  let result: CommandResult
  try {
    result = await runner.run('git', ['diff-index', '--quiet', 'HEAD', '--'], {
      allowFailure: true,
      cwd: root,
    })
  } catch (error) {
    if (error instanceof CommandNotFoundError) {
      return {
        message: 'Unable to check for pending changes: git is not installed',
        stage: 'preflight',
        details: [],
      }
    }
    throw error
  }

  let { exitCode } = result
  if (exitCode === 0) {
    return null
  }
  if (exitCode === 1) {
    return {
      message: 'There are pending changes in the repository. Run git status',
      stage: 'preflight',
      details: [],
    }
  }
  return {
    message: `Unable to check for pending changes: git exited with code ${exitCode}`,
    stage: 'preflight',
    details: [],
  }
}
