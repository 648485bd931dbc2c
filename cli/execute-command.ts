import { resolve } from 'node:path'
import pc from 'picocolors'

import type { ReleaseAction } from '../types/release-action'

import { withCredentialResolver } from '../core/credentials/with-credential-resolver'
import { createReleaseContext } from '../core/context/create-release-context'
import { createTrackerClient } from '../core/tracker/create-tracker-client'
import { readBundleVersion } from '../core/metadata/read-bundle-version'
import { createCommandRunner } from '../core/exec/create-command-runner'
import { loadReleaseConfig } from '../core/config/load-release-config'
import { readTokenFile } from '../core/credentials/read-token-file'
import { runPipeline } from '../core/pipeline/run-pipeline'
import { createStageReporter } from './create-stage-reporter'
import { printChecklist } from './print-checklist'
import { printInfo } from './print-info'

/** Options shared by every command. */
export interface CommandOptions {
  /** Project root. */
  cwd?: string
}

/**
 * Runs a CLI command against the project in the current (or given)
 * directory.
 *
 * The tracker token is resolved, and decrypted when needed, only once a stage
 * talks to the tracker. Decrypted files are removed before returning.
 *
 * @param command - Command name.
 * @param options - Command options.
 */
export async function executeCommand(
  command: ReleaseAction | 'info',
  options: CommandOptions,
): Promise<void> {
  let root = resolve(options.cwd ?? process.cwd())
  let runner = createCommandRunner()
  let config = await loadReleaseConfig(root)

  await withCredentialResolver(runner, async resolver => {
    let version = await readBundleVersion(runner, config.infoPlist)
    let context = createReleaseContext(config, version)

    if (command === 'info') {
      printInfo(context)
      return
    }

    let tracker = createTrackerClient({
      token: async () =>
        readTokenFile(await resolver.resolve(config.tokenFile)),
      owner: config.githubUser,
      repo: config.githubRepo,
    })

    let state = await runPipeline(
      command,
      context,
      { now: () => new Date(), runner, tracker },
      createStageReporter(),
    )

    for (let file of state.files) {
      console.info(pc.gray(`Written ${file}`))
    }
    if (state.checklist) {
      printChecklist(state.checklist)
    }
  })
}
