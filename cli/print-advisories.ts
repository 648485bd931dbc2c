import pc from 'picocolors'

import type { Advisory } from '../types/advisory'

/**
 * Prints advisory conditions found by a stage.
 *
 * @param advisories - Conditions to report.
 */
export function printAdvisories(advisories: Advisory[]): void {
  for (let advisory of advisories) {
    console.warn(pc.yellow(`\n⚠️  Warning: ${advisory.message}`))
    for (let detail of advisory.details) {
      console.warn(pc.gray(`   • ${detail}`))
    }
  }
}
