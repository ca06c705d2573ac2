/**
 * Unrecoverable environment failure: a required tool or environment
 * is missing or could not be provisioned. Aborts the run.
 */
export class EnvironmentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'EnvironmentError'
  }
}

/**
 * A scanner binary could not be executed at all
 */
export class ToolUnavailableError extends EnvironmentError {
  constructor(
    public readonly toolName: string,
    public readonly binaryPath: string,
    reason: string
  ) {
    super(`Tool '${toolName}' is not available at ${binaryPath}: ${reason}`)
    this.name = 'ToolUnavailableError'
  }
}

/**
 * Custom error for configuration loading failures
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly configPath: string | undefined,
    public readonly validationErrors: string[]
  ) {
    super(message)
    this.name = 'ConfigLoadError'
  }
}

/**
 * Extract a displayable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
