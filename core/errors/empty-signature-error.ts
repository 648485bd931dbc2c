import { ReleaseError } from './release-error'

/** Signing tool succeeded but printed nothing. */
export class EmptySignatureError extends ReleaseError {
  /**
   * Creates a new EmptySignatureError.
   *
   * @param tool - Signing tool that was run.
   * @param artifact - File that was signed.
   */
  public constructor(tool: string, artifact: string) {
    super(`${tool} produced an empty signature for ${artifact}`)
    this.name = 'EmptySignatureError'
  }
}
