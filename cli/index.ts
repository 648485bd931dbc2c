import pc from 'picocolors'
import cac from 'cac'

import type { ReleaseAction } from '../types/release-action'
import type { CommandOptions } from './execute-command'

import { executeCommand } from './execute-command'
import { version } from '../package.json'

/**
 * Runs a command and turns failures into a message and exit status 1.
 *
 * @param command - Command name.
 * @param options - Command options.
 */
async function handle(
  command: ReleaseAction | 'info',
  options: CommandOptions,
): Promise<void> {
  try {
    await executeCommand(command, options)
  } catch (error) {
    console.error(
      pc.redBright('\nError:'),
      error instanceof Error ? error.message : String(error),
    )
    process.exit(1)
  }
}

/**
 * Run the CLI.
 *
 * @param argv - Process arguments.
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  let cli = cac('desktop-release')

  cli
    .help()
    .version(version)
    .option('--cwd <directory>', 'Project root (default: current directory)')

  cli
    .command('info', 'Print every derived release setting')
    .action((options: CommandOptions) => handle('info', options))

  cli
    .command('build', 'Build the application')
    .action((options: CommandOptions) => handle('build', options))

  cli
    .command('archive', 'Build and archive the application')
    .action((options: CommandOptions) => handle('archive', options))

  cli
    .command('release-notes', 'Write the HTML release notes')
    .action((options: CommandOptions) => handle('release-notes', options))

  cli
    .command('appcast', 'Build, archive, sign and write the update feed')
    .alias('feed')
    .action((options: CommandOptions) => handle('appcast', options))

  cli
    .command('release', 'Prepare the release and print the remaining steps')
    .action((options: CommandOptions) => handle('release', options))

  cli.command('').action(() => cli.outputHelp())

  cli.parse(argv, { run: false })
  await cli.runMatchedCommand()
}
