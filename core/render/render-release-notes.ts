import markdownTemplate from './templates/release-notes.md.mustache?raw'
import htmlTemplate from './templates/release-notes.html.mustache?raw'

import type { ReleaseNotesFormat } from '../../types/release-notes-format'
import type { ReleaseNotesData } from '../../types/release-notes-data'

import { getMilestoneUrl } from './get-milestone-url'
import { renderTemplate } from './render-template'

/**
 * Render the release notes of a version.
 *
 * The "Issues closed" section is left out entirely when there are no closed
 * issues. HTML output is escaped, Markdown output is not.
 *
 * @param format - Output flavour.
 * @param data - Release data.
 * @returns Rendered notes.
 */
export function renderReleaseNotes(
  format: ReleaseNotesFormat,
  data: ReleaseNotesData,
): string {
  let template = format === 'html' ? htmlTemplate : markdownTemplate

  return renderTemplate(
    template,
    {
      issues: data.issues.map(issue => ({
        number: issue.number,
        title: issue.title,
        url: issue.url,
      })),
      milestoneUrl: getMilestoneUrl(data.repositoryUrl, data.milestone),
      hasIssues: data.issues.length > 0,
      projectName: data.projectName,
      issuesUrl: data.issuesUrl,
      version: data.version,
    },
    { escape: format === 'html' ? 'html' : 'none' },
  )
}
