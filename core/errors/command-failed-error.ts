import { ReleaseError } from './release-error'

/** Lines of standard error kept in the message. */
const STDERR_TAIL_LINES = 10

/** External tool exited with a non-zero status. */
export class CommandFailedError extends ReleaseError {
  /**
   * Creates a new CommandFailedError.
   *
   * @param command - Executable that failed.
   * @param args - Arguments it was called with.
   * @param exitCode - Exit status.
   * @param stderr - Captured standard error.
   */
  public constructor(
    public readonly command: string,
    public readonly args: string[],
    public readonly exitCode: number,
    public readonly stderr: string,
  ) {
    let tail = stderr
      .trim()
      .split(/\r?\n/u)
      .filter(Boolean)
      .slice(-STDERR_TAIL_LINES)
      .join('\n')
    let invocation = [command, ...args].join(' ')
    super(
      `Command failed with exit code ${exitCode}: ${invocation}` +
        (tail ? `\n${tail}` : ''),
    )
    this.name = 'CommandFailedError'
  }
}
