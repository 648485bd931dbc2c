import type { ReleaseContext } from '../types/release-context'

/**
 * Prints every derived setting of the release.
 *
 * @param context - Release context.
 */
export function printInfo(context: ReleaseContext): void {
  console.info('Build info:')
  for (let { label, value } of context.info) {
    console.info(`\t${label}: ${value}`)
  }
}
