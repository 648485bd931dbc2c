import type { CredentialResolver } from '../../types/credential-resolver'
import type { CommandRunner } from '../../types/command-runner'

import { createCredentialResolver } from './create-credential-resolver'

/** Exit status used after an interrupt, by shell convention 128 + signal. */
const SIGNAL_EXIT_CODES: Record<'SIGTERM' | 'SIGINT', number> = {
  SIGTERM: 143,
  SIGINT: 130,
}

/**
 * Run a callback with a credential resolver and release every decrypted file
 * afterwards, whether the callback returns or throws.
 *
 * While the callback runs, an interrupt or termination signal removes the
 * decrypted files before the process exits.
 *
 * @param runner - Runner used to invoke gpg.
 * @param callback - Work needing credentials.
 * @returns Callback result.
 */
export async function withCredentialResolver<T>(
  runner: CommandRunner,
  callback: (resolver: CredentialResolver) => Promise<T>,
): Promise<T> {
  let resolver = createCredentialResolver(runner)

  let onInterrupt = (): void => {
    resolver.disposeSync()
    process.exit(SIGNAL_EXIT_CODES.SIGINT)
  }
  let onTerminate = (): void => {
    resolver.disposeSync()
    process.exit(SIGNAL_EXIT_CODES.SIGTERM)
  }

  process.once('SIGINT', onInterrupt)
  process.once('SIGTERM', onTerminate)

  try {
    return await callback(resolver)
  } finally {
    process.off('SIGINT', onInterrupt)
    process.off('SIGTERM', onTerminate)
    await resolver.dispose()
  }
}
