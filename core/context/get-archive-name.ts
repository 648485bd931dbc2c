/**
 * Name of the release archive.
 *
 * @param name - Product name.
 * @param version - Release version.
 * @returns `{name}-{version}.zip`.
 */
export function getArchiveName(name: string, version: string): string {
  return `${name}-${version}.zip`
}
