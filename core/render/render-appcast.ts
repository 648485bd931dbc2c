import appcastTemplate from './templates/appcast.xml.mustache?raw'

import type { AppcastData } from '../../types/appcast-data'

import { formatFeedDate } from './format-feed-date'
import { renderTemplate } from './render-template'

/**
 * Render the update feed announcing a single release.
 *
 * @param data - Feed data.
 * @returns Feed XML.
 */
export function renderAppcast(data: AppcastData): string {
  return renderTemplate(appcastTemplate, {
    minimumSystemVersion: data.minimumSystemVersion,
    releaseNotesUrl: data.releaseNotesUrl,
    downloadSize: data.downloadSize,
    downloadUrl: data.downloadUrl,
    projectName: data.projectName,
    date: formatFeedDate(data.date),
    appcastUrl: data.appcastUrl,
    signature: data.signature,
    version: data.version,
  })
}
