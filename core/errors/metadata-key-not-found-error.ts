import { ReleaseError } from './release-error'

/** Property list has no entry for the requested key. */
export class MetadataKeyNotFoundError extends ReleaseError {
  /**
   * Creates a new MetadataKeyNotFoundError.
   *
   * @param key - Requested key.
   * @param file - Property list that was searched.
   */
  public constructor(key: string, file: string) {
    super(`Unable to find ${key} in ${file}`)
    this.name = 'MetadataKeyNotFoundError'
  }
}
