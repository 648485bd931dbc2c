import type { TrackerClientContext } from '../../types/tracker-client-context'

import { makeRequest } from './make-request'

/** Largest page size accepted by the GitHub REST API. */
export const PAGE_SIZE = 100

/**
 * Fetch every page of a list endpoint.
 *
 * @param context - Client context.
 * @param path - API path without query string.
 * @param query - Query parameters other than paging.
 * @returns Items of all pages in API order.
 */
export async function getAllPages(
  context: TrackerClientContext,
  path: string,
  query: Record<string, string>,
): Promise<unknown[]> {
  let items: unknown[] = []

  for (let page = 1; ; page++) {
    let search = new URLSearchParams({
      ...query,
      per_page: String(PAGE_SIZE),
      page: String(page),
    })
    let { data } = await makeRequest(context, `${path}?${search.toString()}`)
    if (!Array.isArray(data)) {
      throw new TypeError(`Expected a list from ${path}`)
    }

    items.push(...data)
    if (data.length < PAGE_SIZE) {
      return items
    }
  }
}
