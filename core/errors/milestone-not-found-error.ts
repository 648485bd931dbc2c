import { ReleaseError } from './release-error'

/** No milestone title is a prefix of the release version. */
export class MilestoneNotFoundError extends ReleaseError {
  /**
   * Creates a new MilestoneNotFoundError.
   *
   * @param version - Version that was looked up.
   * @param titles - Milestone titles that were considered.
   */
  public constructor(
    public readonly version: string,
    titles: string[],
  ) {
    let seen = titles.length > 0 ? titles.join(', ') : 'none'
    super(`Unable to find milestone for version ${version} (milestones: ${seen})`)
    this.name = 'MilestoneNotFoundError'
  }
}
