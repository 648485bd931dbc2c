/** Fields of a GitHub milestone the release relies on. */
export interface MilestonePayload {
  html_url: string
  number: number
  title: string
}

/**
 * Type guard for milestone objects returned by the GitHub API.
 *
 * @param value - The value to check.
 * @returns True if the value carries a numeric id, a title and a URL.
 */
export function isMilestonePayload(value: unknown): value is MilestonePayload {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false
  }

  let object = value as Record<string, unknown>
  return (
    typeof object['number'] === 'number' &&
    typeof object['title'] === 'string' &&
    typeof object['html_url'] === 'string'
  )
}
