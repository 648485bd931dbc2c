import type { ReleaseConfigFile } from '../../../types/release-config-file'

/** Optional string settings of the project file. */
const OPTIONAL_KEYS = [
  'releaseNotesBaseUrl',
  'repositoryUrl',
  'infoPlist',
  'sourceDir',
] as const

/**
 * Type guard to check if a value conforms to the ReleaseConfigFile interface.
 *
 * @param value - The value to check.
 * @returns True if the value is a valid project configuration.
 */
export function isReleaseConfigFile(
  value: unknown,
): value is ReleaseConfigFile {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false
  }

  let object = value as Record<string, unknown>
  if (typeof object['name'] !== 'string' || object['name'].trim() === '') {
    return false
  }

  /** Unquoted versions such as `14.6` are read by YAML as numbers. */
  let minimumSystemVersion = object['minimumSystemVersion']
  if (
    minimumSystemVersion !== undefined &&
    typeof minimumSystemVersion !== 'string' &&
    typeof minimumSystemVersion !== 'number'
  ) {
    return false
  }

  return OPTIONAL_KEYS.every(
    key => object[key] === undefined || typeof object[key] === 'string',
  )
}
