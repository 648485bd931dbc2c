import { ReleaseError } from './release-error'

/** Encrypted credential requested while gpg is not installed. */
export class DecryptionUnavailableError extends ReleaseError {
  /**
   * Creates a new DecryptionUnavailableError.
   *
   * @param source - Encrypted file that was requested.
   */
  public constructor(public readonly source: string) {
    super(`gpg command not found; unable to decrypt ${source}`)
    this.name = 'DecryptionUnavailableError'
  }
}
