import type { TrackerClientContext } from '../../types/tracker-client-context'

/**
 * Record when the rate limit window resets, from response headers.
 *
 * @param context - Client context with a mutable reset time.
 * @param headers - Response headers map.
 */
export function updateRateLimitInfo(
  context: TrackerClientContext,
  headers: Record<string, undefined | string>,
): void {
  let reset = headers['x-ratelimit-reset']
  if (reset !== undefined) {
    context.rateLimitReset = new Date(Number.parseInt(reset, 10) * 1000)
  }
}
