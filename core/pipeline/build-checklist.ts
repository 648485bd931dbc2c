import type { ReleaseChecklist } from '../../types/release-checklist'
import type { ReleaseContext } from '../../types/release-context'

/**
 * Manual steps that publish a prepared release.
 *
 * @param context - Release context.
 * @param description - Markdown release notes.
 * @returns Release checklist.
 */
export function buildChecklist(
  context: ReleaseContext,
  description: string,
): ReleaseChecklist {
  let { version, name } = context

  return {
    steps: [
      {
        detail: `message: "Added appcast and release notes for the ${name} ${version} release"`,
        title: 'Commit appcast and release notes',
      },
      { title: 'Finish the git flow' },
      { title: `Close milestone at: ${context.milestonesUrl}` },
      {
        title: `Release at: ${context.releasesUrl} and draft a new release with:`,
      },
    ],
    tag: `version-${version}`,
    title: version,
    description,
  }
}
