import type { TrackerClientContext } from '../../types/tracker-client-context'
import type { TrackerClient } from '../../types/tracker-client'

import { getMilestoneIssues } from './get-milestone-issues'
import { getMilestones } from './get-milestones'

/** Options of the GitHub tracker client. */
interface TrackerClientOptions {
  /** Token or a loader called once on the first request. */
  token?: (() => Promise<string>) | string

  /** REST API base URL. */
  baseUrl?: string

  /** Repository owner. */
  owner: string

  /** Repository name. */
  repo: string
}

/**
 * Create a GitHub issue tracker client for one repository.
 *
 * A token loader defers credential resolution (and any decryption) until the
 * first API call.
 *
 * @param options - Repository coordinates and credentials.
 * @returns Client with bound methods.
 */
export function createTrackerClient(
  options: TrackerClientOptions,
): TrackerClient {
  let { baseUrl = 'https://api.github.com', token, owner, repo } = options
  let pendingToken: Promise<string> | undefined

  let context: TrackerClientContext = {
    getToken: () => {
      if (typeof token !== 'function') {
        return Promise.resolve(token)
      }
      pendingToken ??= token()
      return pendingToken
    },
    rateLimitReset: new Date(),
    baseUrl,
    owner,
    repo,
  }

  return {
    getMilestoneIssues: (milestone, state) =>
      getMilestoneIssues(context, { milestone, state }),
    getMilestones: state => getMilestones(context, state),
  }
}
