/** Captured outcome of an external command. */
export interface CommandResult {
  /** Standard output decoded as UTF-8. */
  stdout: string

  /** Standard error decoded as UTF-8. */
  stderr: string

  /** Raw standard output bytes. */
  output: Buffer

  /** Process exit code (1 when the process was terminated by a signal). */
  exitCode: number
}
