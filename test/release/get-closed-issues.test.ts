import { describe, expect, it, vi } from 'vitest'

import type { TrackerClient } from '../../types/tracker-client'
import type { Milestone } from '../../types/milestone'

import { getClosedIssues } from '../../core/release/get-closed-issues'
import { findMilestone } from '../../core/release/find-milestone'
import { getOpenIssues } from '../../core/release/get-open-issues'

let milestone: Milestone = {
  url: 'https://github.com/octo/shiftit/milestone/7',
  title: '2.1',
  number: 7,
}

function createTracker(): TrackerClient {
  return {
    getMilestoneIssues: vi.fn<TrackerClient['getMilestoneIssues']>(
      (_milestone, state) =>
        Promise.resolve(
          state === 'closed'
            ? [
                {
                  closedAt: new Date('2026-10-05T00:00:00Z'),
                  url: 'https://github.com/octo/shiftit/issues/12',
                  title: 'Improve speed',
                  number: 12,
                },
                {
                  closedAt: new Date('2026-10-01T00:00:00Z'),
                  url: 'https://github.com/octo/shiftit/issues/10',
                  title: 'Fix crash',
                  number: 10,
                },
              ]
            : [
                {
                  url: 'https://github.com/octo/shiftit/issues/13',
                  title: 'Dark mode',
                  closedAt: null,
                  number: 13,
                },
              ],
        ),
    ),
    getMilestones: vi.fn(() => Promise.resolve([milestone])),
  }
}

describe('getClosedIssues', () => {
  it('returns closed issues of the milestone, earliest closed first', async () => {
    let tracker = createTracker()

    let issues = await getClosedIssues(tracker, milestone)

    expect(issues.map(({ number }) => number)).toEqual([10, 12])
    expect(tracker.getMilestoneIssues).toHaveBeenCalledWith(7, 'closed')
  })
})

describe('getOpenIssues', () => {
  it('returns open issues of the milestone', async () => {
    let tracker = createTracker()

    let issues = await getOpenIssues(tracker, milestone)

    expect(issues.map(({ number }) => number)).toEqual([13])
    expect(tracker.getMilestoneIssues).toHaveBeenCalledWith(7, 'open')
  })
})

describe('findMilestone', () => {
  it('resolves the version against open milestones', async () => {
    let tracker = createTracker()

    await expect(findMilestone(tracker, '2.1.3')).resolves.toBe(milestone)
    expect(tracker.getMilestones).toHaveBeenCalledWith('open')
  })
})
