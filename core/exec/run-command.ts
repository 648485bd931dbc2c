import { spawn } from 'node:child_process'

import type { RunCommandOptions } from '../../types/run-command-options'
import type { CommandResult } from '../../types/command-result'

import { CommandNotFoundError } from '../errors/command-not-found-error'
import { CommandFailedError } from '../errors/command-failed-error'

/**
 * Run an external command, capture its output and classify the exit status.
 *
 * A missing executable rejects with CommandNotFoundError. A non-zero exit
 * rejects with CommandFailedError unless `allowFailure` is set, in which case
 * the caller inspects `exitCode` itself.
 *
 * @param command - Executable name or path.
 * @param args - Command arguments.
 * @param options - Working directory and failure handling.
 * @returns Captured output and exit code.
 */
export function runCommand(
  command: string,
  args: string[],
  options: RunCommandOptions = {},
): Promise<CommandResult> {
  let { allowFailure = false, cwd } = options

  return new Promise((resolve, reject) => {
    let child = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      cwd,
    })

    let stdoutChunks: Buffer[] = []
    let stderrChunks: Buffer[] = []

    child.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk))
    child.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk))

    child.on('error', error => {
      if ('code' in error && error.code === 'ENOENT') {
        reject(new CommandNotFoundError(command))
        return
      }
      reject(error)
    })

    child.on('close', code => {
      let output = Buffer.concat(stdoutChunks)
      let result: CommandResult = {
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
        stdout: output.toString('utf8'),
        exitCode: code ?? 1,
        output,
      }

      if (result.exitCode !== 0 && !allowFailure) {
        reject(
          new CommandFailedError(command, args, result.exitCode, result.stderr),
        )
        return
      }
      resolve(result)
    })
  })
}
