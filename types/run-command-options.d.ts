/** Options accepted by the command runner. */
export interface RunCommandOptions {
  /**
   * Resolve with the result instead of rejecting when the command exits with a
   * non-zero status.
   */
  allowFailure?: boolean

  /** Working directory of the child process. */
  cwd?: string
}
