import { ReleaseError } from './release-error'

/** File expected from an earlier stage does not exist. */
export class ArtifactNotFoundError extends ReleaseError {
  /**
   * Creates a new ArtifactNotFoundError.
   *
   * @param path - Missing artifact.
   */
  public constructor(public readonly path: string) {
    super(`Artifact not found: ${path}`)
    this.name = 'ArtifactNotFoundError'
  }
}
