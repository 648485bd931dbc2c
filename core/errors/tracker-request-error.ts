import { ReleaseError } from './release-error'

/** Tracker API answered with a non-success status. */
export class TrackerRequestError extends ReleaseError {
  /**
   * Creates a new TrackerRequestError.
   *
   * @param status - HTTP status code.
   * @param statusText - HTTP status text.
   */
  public constructor(
    public readonly status: number,
    statusText: string,
  ) {
    super(`GitHub API error: ${status} ${statusText}`)
    this.name = 'TrackerRequestError'
  }
}
