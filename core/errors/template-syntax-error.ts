import { ReleaseError } from './release-error'

/** Template cannot be parsed. */
export class TemplateSyntaxError extends ReleaseError {
  /**
   * Creates a new TemplateSyntaxError.
   *
   * @param reason - What is malformed.
   * @param line - One-based line of the offending tag.
   */
  public constructor(
    reason: string,
    public readonly line: number,
  ) {
    super(`Template syntax error on line ${line}: ${reason}`)
    this.name = 'TemplateSyntaxError'
  }
}
