import { ReleaseError } from './release-error'

/** External tool is not installed or not executable. */
export class CommandNotFoundError extends ReleaseError {
  /**
   * Creates a new CommandNotFoundError.
   *
   * @param command - Executable that could not be started.
   */
  public constructor(public readonly command: string) {
    super(`Command not found: ${command}`)
    this.name = 'CommandNotFoundError'
  }
}
