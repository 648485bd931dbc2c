/**
 * Public download URL of a release archive.
 *
 * @param baseUrl - Download base, e.g. `https://github.com/o/r/releases/download`.
 * @param version - Release version.
 * @param archiveName - Archive file name.
 * @returns `{base}/version-{version}/{archive}`.
 */
export function getDownloadUrl(
  baseUrl: string,
  version: string,
  archiveName: string,
): string {
  return `${baseUrl}/version-${version}/${archiveName}`
}
