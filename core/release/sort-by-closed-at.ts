import type { Issue } from '../../types/issue'

/**
 * Order issues by closing time, earliest first.
 *
 * The sort is stable, so issues closed at the same instant keep their fetch
 * order. Issues without a closing time go last.
 *
 * @param issues - Issues in fetch order.
 * @returns New sorted array.
 */
export function sortByClosedAt(issues: Issue[]): Issue[] {
  return [...issues].sort((left, right) => {
    if (left.closedAt === null || right.closedAt === null) {
      return Number(left.closedAt === null) - Number(right.closedAt === null)
    }
    return left.closedAt.getTime() - right.closedAt.getTime()
  })
}
