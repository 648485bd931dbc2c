/** Fields of a GitHub issue the release relies on. */
export interface IssuePayload {
  closed_at?: string | null
  html_url: string
  number: number
  title: string
}

/**
 * Type guard for issue objects returned by the GitHub API.
 *
 * Pull requests are listed by the same endpoint and pass this guard too, as
 * they are part of the milestone.
 *
 * @param value - The value to check.
 * @returns True if the value has the issue fields used by the release.
 */
export function isIssuePayload(value: unknown): value is IssuePayload {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false
  }

  let object = value as Record<string, unknown>
  let closedAt = object['closed_at']
  return (
    typeof object['number'] === 'number' &&
    typeof object['title'] === 'string' &&
    typeof object['html_url'] === 'string' &&
    (closedAt === null || closedAt === undefined || typeof closedAt === 'string')
  )
}
