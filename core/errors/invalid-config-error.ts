import { ReleaseError } from './release-error'

/** Configuration file exists but cannot be used. */
export class InvalidConfigError extends ReleaseError {
  /**
   * Creates a new InvalidConfigError.
   *
   * @param file - Offending configuration file.
   * @param reason - What is wrong with it.
   */
  public constructor(file: string, reason: string) {
    super(`Invalid configuration in ${file}: ${reason}`)
    this.name = 'InvalidConfigError'
  }
}
