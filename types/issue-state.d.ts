/** Issue state filter understood by the tracker. */
export type IssueState = 'closed' | 'open'
