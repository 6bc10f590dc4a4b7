/**
 * Error codes for configuration problems
 */
export const ConfigErrorCode = {
  UNKNOWN_GROUP: 'UNKNOWN_GROUP',
  DUPLICATE_GROUP: 'DUPLICATE_GROUP',
  INVALID_OPTIONS: 'INVALID_OPTIONS',
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
} as const

export type ConfigErrorCode = (typeof ConfigErrorCode)[keyof typeof ConfigErrorCode]

/**
 * Raised before any member is checked when the configuration cannot be used.
 * Fatal for the run.
 */
export class ConfigurationError extends Error {
  constructor(
    public code: ConfigErrorCode,
    message: string,
  ) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

export function unknownGroupError(key: string): ConfigurationError {
  return new ConfigurationError(ConfigErrorCode.UNKNOWN_GROUP, `Unknown member group: ${key}`)
}

export function duplicateGroupError(key: string): ConfigurationError {
  return new ConfigurationError(
    ConfigErrorCode.DUPLICATE_GROUP,
    `Member group listed more than once: ${key}`,
  )
}

export function invalidOptionsError(reason: string): ConfigurationError {
  return new ConfigurationError(ConfigErrorCode.INVALID_OPTIONS, `Invalid options: ${reason}`)
}

export function configNotFoundError(path: string): ConfigurationError {
  return new ConfigurationError(ConfigErrorCode.CONFIG_NOT_FOUND, `Config file not found: ${path}`)
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError
}
