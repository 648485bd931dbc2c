import { ReleaseError } from './release-error'

/** Required configuration value is absent. */
export class MissingConfigError extends ReleaseError {
  /**
   * Creates a new MissingConfigError.
   *
   * @param key - Name of the missing setting.
   * @param hint - Where the value is expected to come from.
   */
  public constructor(
    public readonly key: string,
    hint: string,
  ) {
    super(`Missing configuration "${key}": ${hint}`)
    this.name = 'MissingConfigError'
  }
}
