import { MissingConfigError } from '../errors/missing-config-error'

/**
 * Read a required environment variable.
 *
 * @param environment - Environment to read from.
 * @param name - Variable name.
 * @returns Trimmed value.
 */
export function requireEnvironment(
  environment: NodeJS.ProcessEnv,
  name: string,
): string {
  let value = environment[name]?.trim()
  if (!value) {
    throw new MissingConfigError(name, 'set it in the environment')
  }
  return value
}
