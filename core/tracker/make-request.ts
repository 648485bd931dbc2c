import type { TrackerClientContext } from '../../types/tracker-client-context'

import { TrackerRateLimitError } from '../errors/tracker-rate-limit-error'
import { TrackerRequestError } from '../errors/tracker-request-error'
import { updateRateLimitInfo } from './update-rate-limit-info'

/**
 * Perform a GET request against the GitHub API with auth and rate-limit
 * updates.
 *
 * @param context - Client context with token and rate-limit state.
 * @param path - API path beginning with '/'.
 * @returns Response headers and parsed data.
 */
export async function makeRequest(
  context: TrackerClientContext,
  path: string,
): Promise<{ headers: Record<string, string>; data: unknown }> {
  let headers: Record<string, string> = {
    Accept: 'application/vnd.github.v3+json',
    'User-Agent': 'desktop-release',
  }

  let token = await context.getToken()
  if (token) {
    headers['Authorization'] = `Bearer ${token}`
  }

  let response = await fetch(`${context.baseUrl}${path}`, { headers })

  let responseHeaders: Record<string, string> = {}
  for (let [key, value] of response.headers.entries()) {
    responseHeaders[key] = value
  }

  updateRateLimitInfo(context, responseHeaders)

  if (!response.ok) {
    if (response.status === 403) {
      let text = await response.text()
      if (text.includes('rate limit')) {
        throw new TrackerRateLimitError(context.rateLimitReset)
      }
    }
    throw new TrackerRequestError(response.status, response.statusText)
  }

  let data: unknown = await response.json()
  return { headers: responseHeaders, data }
}
