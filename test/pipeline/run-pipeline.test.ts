import type { Mock } from 'vitest'

import { mkdtemp, readFile, writeFile, access, mkdir, rm } from 'node:fs/promises'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import type { PipelineServices } from '../../types/pipeline-services'
import type { ReleaseContext } from '../../types/release-context'
import type { CommandRunner } from '../../types/command-runner'
import type { TrackerClient } from '../../types/tracker-client'
import type { Issue } from '../../types/issue'

import { MetadataKeyNotFoundError } from '../../core/errors/metadata-key-not-found-error'
import { MilestoneNotFoundError } from '../../core/errors/milestone-not-found-error'
import { createReleaseContext } from '../../core/context/create-release-context'
import { EmptySignatureError } from '../../core/errors/empty-signature-error'
import { runFeedStage } from '../../core/pipeline/stages/run-feed-stage'
import { runPipeline } from '../../core/pipeline/run-pipeline'

let infoPlist = `<?xml version="1.0" encoding="UTF-8"?>
<plist version="1.0">
<dict>
  <key>CFBundleVersion</key>
  <string>2.1.3</string>
  <key>SUFeedURL</key>
  <string>https://example.test/release/appcast.xml</string>
</dict>
</plist>
`

let closedIssues: Issue[] = [
  {
    url: 'https://github.com/octo/shiftit/issues/12',
    closedAt: new Date('2026-10-05T00:00:00Z'),
    title: 'Improve speed',
    number: 12,
  },
  {
    url: 'https://github.com/octo/shiftit/issues/10',
    closedAt: new Date('2026-10-01T00:00:00Z'),
    title: 'Fix crash',
    number: 10,
  },
]

function createTracker(openIssues: Issue[] = []): {
  getMilestoneIssues: Mock<TrackerClient['getMilestoneIssues']>
  getMilestones: Mock<TrackerClient['getMilestones']>
} {
  return {
    getMilestones: vi.fn<TrackerClient['getMilestones']>().mockResolvedValue([
      {
        url: 'https://github.com/octo/shiftit/milestone/6',
        title: '2.0',
        number: 6,
      },
      {
        url: 'https://github.com/octo/shiftit/milestone/7',
        title: '2.1',
        number: 7,
      },
    ]),
    getMilestoneIssues: vi.fn<TrackerClient['getMilestoneIssues']>(
      (_milestone, state) =>
        Promise.resolve(state === 'closed' ? closedIssues : openIssues),
    ),
  }
}

describe('runPipeline', () => {
  let context: ReleaseContext
  let root: string

  function createRunner(
    options: { gitExitCode?: number; signature?: string } = {},
  ): Mock<CommandRunner['run']> {
    let { signature = 'c2lnbmF0dXJl==\n', gitExitCode = 0 } = options

    return vi.fn<CommandRunner['run']>(async (command, args) => {
      if (command === 'ditto') {
        await writeFile(args.at(-1) ?? '', 'zip-bytes')
      }
      let stdout = command === context.signTool ? signature : ''
      return {
        exitCode: command === 'git' ? gitExitCode : 0,
        output: Buffer.from(stdout),
        stderr: '',
        stdout,
      }
    })
  }

  function createServices(
    runner: ReturnType<typeof createRunner>,
    tracker: ReturnType<typeof createTracker>,
  ): PipelineServices {
    return {
      now: () => new Date('2026-10-19T10:54:00Z'),
      runner: { run: runner },
      tracker,
    }
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'run-pipeline-'))
    let sourceDir = join(root, 'ShiftIt')
    await mkdir(sourceDir)
    await writeFile(join(sourceDir, 'ShiftIt-Info.plist'), infoPlist)

    context = createReleaseContext(
      {
        releaseNotesBaseUrl: 'https://example.test/release',
        infoPlist: join(sourceDir, 'ShiftIt-Info.plist'),
        signTool: join(sourceDir, 'bin', 'sign_update'),
        repositoryUrl: 'https://github.com/octo/shiftit',
        tokenFile: join(root, 'github.token'),
        minimumSystemVersion: '14.6',
        githubRepo: 'shiftit',
        githubUser: 'octo',
        name: 'ShiftIt',
        sourceDir,
        root,
      },
      '2.1.3',
    )
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('prepares a complete release', async () => {
    let runner = createRunner()
    let tracker = createTracker()
    let onStageSuccess = vi.fn()
    let onStageStart = vi.fn()

    let state = await runPipeline(
      'release',
      context,
      createServices(runner, tracker),
      { onStageSuccess, onStageStart },
    )

    expect(state.advisories).toEqual([])
    expect(state.files).toEqual([
      join(root, 'release', 'release-notes-2.1.3.html'),
      join(root, 'release', 'appcast.xml'),
    ])
    expect(runner.mock.calls.map(([command]) => command)).toEqual([
      'git',
      'xcodebuild',
      'ditto',
      context.signTool,
    ])
    expect(runner).toHaveBeenCalledWith(
      'xcodebuild',
      ['-target', 'ShiftIt', '-configuration', 'Release'],
      { cwd: join(root, 'ShiftIt') },
    )
    expect(runner).toHaveBeenCalledWith('ditto', [
      '-ck',
      '--keepParent',
      join(root, 'ShiftIt', 'build', 'Release', 'ShiftIt.app'),
      join(root, 'build', 'ShiftIt-2.1.3.zip'),
    ])
    expect(tracker.getMilestones).toHaveBeenCalledOnce()
    expect(tracker.getMilestoneIssues).toHaveBeenCalledWith(7, 'open')
    expect(tracker.getMilestoneIssues).toHaveBeenCalledWith(7, 'closed')
    expect(tracker.getMilestoneIssues).toHaveBeenCalledTimes(2)
    expect(onStageStart.mock.calls.map(([stage]) => stage)).toEqual([
      'preflight',
      'build',
      'archive',
      'sign',
      'notes',
      'feed',
      'checklist',
    ])
    expect(onStageSuccess).toHaveBeenCalledWith('preflight', [])

    let notes = await readFile(context.releaseNotesFile, 'utf8')
    expect(notes).toContain(
      '<li><a href="https://github.com/octo/shiftit/issues/10"><b>#10</b></a> - Fix crash</li>\n' +
        '            <li><a href="https://github.com/octo/shiftit/issues/12"><b>#12</b></a> - Improve speed</li>\n',
    )

    let appcast = await readFile(context.appcastFile, 'utf8')
    expect(appcast).toContain(
      '<link>https://example.test/release/appcast.xml</link>',
    )
    expect(appcast).toContain('length="9"')
    expect(appcast).toContain('sparkle:edSignature="c2lnbmF0dXJl=="')
    expect(appcast).toContain(
      '<pubDate>Mon, 19 Oct 2026 10:54:00 +0000</pubDate>',
    )

    expect(state.checklist).toMatchObject({
      description: [
        '## Issues closed',
        '- [#10](https://github.com/octo/shiftit/issues/10) - Fix crash',
        '- [#12](https://github.com/octo/shiftit/issues/12) - Improve speed',
        '',
        'More information about this release can be found on [GitHub](https://github.com/octo/shiftit/issues?milestone=7).',
        '',
        'If you find any bugs please report them on [GitHub](https://github.com/octo/shiftit/issues).',
        '',
      ].join('\n'),
      tag: 'version-2.1.3',
      title: '2.1.3',
    })
  })

  it('reports pending changes and open issues without stopping', async () => {
    let runner = createRunner({ gitExitCode: 1 })
    let tracker = createTracker([
      {
        url: 'https://github.com/octo/shiftit/issues/13',
        title: 'Dark mode',
        closedAt: null,
        number: 13,
      },
    ])
    let onStageSuccess = vi.fn()

    let state = await runPipeline(
      'release',
      context,
      createServices(runner, tracker),
      { onStageSuccess },
    )

    let advisories = [
      {
        message: 'There are pending changes in the repository. Run git status',
        stage: 'preflight',
        details: [],
      },
      {
        message: 'There are still open issues',
        details: ['#13: Dark mode'],
        stage: 'preflight',
      },
    ]
    expect(state.advisories).toEqual(advisories)
    expect(onStageSuccess).toHaveBeenCalledWith('preflight', advisories)
    expect(onStageSuccess).toHaveBeenCalledWith('build', [])
    expect(state.checklist).toBeDefined()
  })

  it('stops before the feed when the signature is empty', async () => {
    let runner = createRunner({ signature: '\n' })
    let tracker = createTracker()
    let onStageError = vi.fn()

    await expect(
      runPipeline('release', context, createServices(runner, tracker), {
        onStageError,
      }),
    ).rejects.toThrowError(EmptySignatureError)

    expect(onStageError).toHaveBeenCalledWith(
      'sign',
      expect.any(EmptySignatureError),
    )
    await expect(access(context.appcastFile)).rejects.toThrowError()
    await expect(access(context.releaseNotesFile)).rejects.toThrowError()
  })

  it('stops at the first failing stage', async () => {
    let runner = createRunner()
    runner.mockRejectedValueOnce(new Error('xcodebuild failed'))
    let tracker = createTracker()

    await expect(
      runPipeline('archive', context, createServices(runner, tracker)),
    ).rejects.toThrowError('xcodebuild failed')
    expect(runner).toHaveBeenCalledOnce()
    expect(tracker.getMilestones).not.toHaveBeenCalled()
  })

  it('writes only the release notes for release-notes', async () => {
    let runner = createRunner()
    let tracker = createTracker()

    let state = await runPipeline(
      'release-notes',
      context,
      createServices(runner, tracker),
    )

    expect(state.files).toEqual([context.releaseNotesFile])
    expect(state.checklist).toBeUndefined()
    expect(runner).not.toHaveBeenCalled()
    expect(tracker.getMilestoneIssues).toHaveBeenCalledWith(7, 'closed')
  })

  it('does not contact the tracker for build and archive', async () => {
    let runner = createRunner()
    let tracker = createTracker()

    let state = await runPipeline(
      'archive',
      context,
      createServices(runner, tracker),
    )

    expect(state.files).toEqual([])
    await expect(
      readFile(join(root, 'build', 'ShiftIt-2.1.3.zip'), 'utf8'),
    ).resolves.toBe('zip-bytes')
    expect(tracker.getMilestones).not.toHaveBeenCalled()
  })

  it('checks the feed URL before building the appcast', async () => {
    await writeFile(
      context.infoPlist,
      infoPlist.replace(
        '  <key>SUFeedURL</key>\n  <string>https://example.test/release/appcast.xml</string>\n',
        '',
      ),
    )
    let runner = createRunner()
    let tracker = createTracker()
    let onStageStart = vi.fn()

    await expect(
      runPipeline('appcast', context, createServices(runner, tracker), {
        onStageStart,
      }),
    ).rejects.toThrowError(MetadataKeyNotFoundError)

    expect(runner).not.toHaveBeenCalled()
    expect(onStageStart).not.toHaveBeenCalled()
  })

  it('checks the milestone before building a release', async () => {
    let runner = createRunner()
    let tracker = createTracker()
    tracker.getMilestones.mockResolvedValue([
      {
        url: 'https://github.com/octo/shiftit/milestone/6',
        title: '2.0',
        number: 6,
      },
    ])

    await expect(
      runPipeline('release', context, createServices(runner, tracker)),
    ).rejects.toThrowError(MilestoneNotFoundError)

    expect(runner).not.toHaveBeenCalled()
    expect(tracker.getMilestoneIssues).not.toHaveBeenCalled()
  })

  it('requires a signed archive for the feed', async () => {
    await expect(
      runFeedStage(context, createServices(createRunner(), createTracker()), {
        advisories: [],
        files: [],
      }),
    ).rejects.toThrowError('The update feed requires a signed archive')
  })
})
