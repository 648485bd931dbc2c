/** Base class of every fatal condition raised by the release tooling. */
export class ReleaseError extends Error {
  /**
   * Creates a new ReleaseError.
   *
   * @param message - Human-readable cause.
   */
  public constructor(message: string) {
    super(message)
    this.name = 'ReleaseError'
  }
}
