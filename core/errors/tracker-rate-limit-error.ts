import { ReleaseError } from './release-error'

/** Tracker API rate limit is exhausted. */
export class TrackerRateLimitError extends ReleaseError {
  /**
   * Creates a new TrackerRateLimitError.
   *
   * @param resetAt - The time when the rate limit resets.
   */
  public constructor(public readonly resetAt: Date) {
    super(
      `GitHub API rate limit exceeded. Resets at ${resetAt.toISOString()}`,
    )
    this.name = 'TrackerRateLimitError'
  }
}
