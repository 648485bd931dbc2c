import { access } from 'node:fs/promises'

import type { CommandRunner } from '../../types/command-runner'

import { ArtifactNotFoundError } from '../errors/artifact-not-found-error'
import { EmptySignatureError } from '../errors/empty-signature-error'

/**
 * Sign an artifact with the external signing tool.
 *
 * The trimmed standard output is the signature; its content is not
 * interpreted. An empty output is rejected so that no feed is published with
 * a blank signature.
 *
 * @param runner - Command runner.
 * @param tool - Signing tool executable.
 * @param artifactPath - File to sign.
 * @returns Signature token.
 */
export async function signArtifact(
  runner: CommandRunner,
  tool: string,
  artifactPath: string,
): Promise<string> {
  try {
    await access(artifactPath)
  } catch {
    throw new ArtifactNotFoundError(artifactPath)
  }

  let result = await runner.run(tool, [artifactPath])
  let signature = result.stdout.trim()
  if (!signature) {
    throw new EmptySignatureError(tool, artifactPath)
  }
  return signature
}
