import type { CommandRunner } from '../../types/command-runner'

/**
 * Read the bundle version through the `defaults` metadata query tool.
 *
 * The value is returned as printed, without any format validation.
 *
 * @param runner - Command runner.
 * @param infoPlist - Absolute path of the Info.plist descriptor.
 * @returns Trimmed `CFBundleVersion` value.
 */
export async function readBundleVersion(
  runner: CommandRunner,
  infoPlist: string,
): Promise<string> {
  let result = await runner.run('defaults', [
    'read',
    infoPlist,
    'CFBundleVersion',
  ])
  return result.stdout.trim()
}
