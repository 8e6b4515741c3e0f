/**
 * edgectl Error Hierarchy
 *
 * Typed error classes shared by the CLI and programmatic usage.
 *
 * Hierarchy:
 *   EdgectlError (base)
 *   ├── ConfigError
 *   │   └── InvalidConfigError
 *   ├── ApiError (transport, auth, server failures)
 *   ├── ResolutionError (app reference matched nothing)
 *   ├── ValidationError (input validation)
 *   │   ├── MissingInputError
 *   │   ├── ConflictingArgumentsError
 *   │   ├── InvalidFormatError
 *   │   ├── UnsupportedFormatError
 *   │   └── InvalidAppIdentError
 *   ├── InputError (interactive prompt failures)
 *   └── OperationError
 *       ├── SecretNotFoundError
 *       └── IoError
 */

interface EdgectlErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: unknown
}

/**
 * Base error class for all edgectl errors
 */
export class EdgectlError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: EdgectlErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'EdgectlError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
      stack: this.stack
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends EdgectlError {
  constructor(message: string, code: string, options?: EdgectlErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when a YAML config file cannot be parsed or has the wrong shape
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: unknown) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check the YAML syntax of the file',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

// =============================================================================
// API Errors
// =============================================================================

/**
 * Transport, authentication or server-side failure talking to the platform
 */
export class ApiError extends EdgectlError {
  /** HTTP status, when the server answered */
  readonly status?: number

  constructor(message: string, options?: EdgectlErrorOptions & { status?: number }) {
    super(message, 'API_ERROR', {
      suggestion: options?.suggestion ?? (options?.status === 401 || options?.status === 403
        ? 'Check your token (--token or EDGECTL_TOKEN)'
        : undefined),
      context: options?.status !== undefined
        ? { ...options?.context, status: options.status }
        : options?.context,
      cause: options?.cause
    })
    this.name = 'ApiError'
    this.status = options?.status
  }
}

/**
 * Thrown when an app reference does not match any app
 */
export class ResolutionError extends EdgectlError {
  constructor(reference: string) {
    super(
      `Could not find app ${reference}`,
      'APP_NOT_FOUND',
      {
        suggestion: 'Pass the app id, or use owner/name to select an app owned by another namespace',
        context: { reference }
      }
    )
    this.name = 'ResolutionError'
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

export class ValidationError extends EdgectlError {
  constructor(message: string, code: string, options?: EdgectlErrorOptions) {
    super(message, code, options)
    this.name = 'ValidationError'
  }
}

/**
 * Thrown when a required value is absent and prompting is disabled
 */
export class MissingInputError extends ValidationError {
  constructor(inputName: string, suggestion?: string) {
    super(
      `No ${inputName} given`,
      'MISSING_INPUT',
      {
        suggestion: suggestion ?? `Supply the ${inputName} explicitly`,
        context: { inputName }
      }
    )
    this.name = 'MissingInputError'
  }
}

/**
 * Thrown when two mutually exclusive arguments are combined
 */
export class ConflictingArgumentsError extends ValidationError {
  constructor(first: string, second: string) {
    super(
      `The argument '${first}' cannot be used with '${second}'`,
      'CONFLICTING_ARGUMENTS',
      {
        suggestion: `Remove either '${first}' or '${second}'`,
        context: { arguments: [first, second] }
      }
    )
    this.name = 'ConflictingArgumentsError'
  }
}

/**
 * Thrown for an unknown --format value
 */
export class InvalidFormatError extends ValidationError {
  constructor(format: string, validFormats: readonly string[]) {
    super(
      `Invalid format: "${format}"`,
      'INVALID_FORMAT',
      {
        suggestion: `Valid formats: ${validFormats.join(', ')}`,
        context: { format, validFormats: [...validFormats] }
      }
    )
    this.name = 'InvalidFormatError'
  }
}

/**
 * Thrown when a known format does not apply to the current output
 */
export class UnsupportedFormatError extends ValidationError {
  constructor(message: string, format: string) {
    super(message, 'UNSUPPORTED_FORMAT', {
      suggestion: 'Use json, yaml or table',
      context: { format }
    })
    this.name = 'UnsupportedFormatError'
  }
}

export class InvalidAppIdentError extends ValidationError {
  constructor(input: string) {
    super(
      `Invalid app reference: "${input}"`,
      'INVALID_APP_IDENT',
      {
        suggestion: 'Use an app id, a name, owner/name or the app URL',
        context: { input }
      }
    )
    this.name = 'InvalidAppIdentError'
  }
}

// =============================================================================
// Interaction Errors
// =============================================================================

/**
 * Thrown when an interactive prompt cannot be completed
 */
export class InputError extends EdgectlError {
  constructor(message: string, cause?: unknown) {
    super(message, 'INPUT_FAILED', {
      suggestion: 'Pass the value as an argument, or run from an interactive terminal',
      cause
    })
    this.name = 'InputError'
  }
}

// =============================================================================
// Operation Errors
// =============================================================================

export class OperationError extends EdgectlError {
  constructor(message: string, code: string, options?: EdgectlErrorOptions) {
    super(message, code, options)
    this.name = 'OperationError'
  }
}

export class SecretNotFoundError extends OperationError {
  constructor(name: string, appId: string) {
    super(
      `Secret "${name}" not found for app ${appId}`,
      'SECRET_NOT_FOUND',
      {
        suggestion: 'Use --all to reveal every secret of the app',
        context: { name, appId }
      }
    )
    this.name = 'SecretNotFoundError'
  }
}

/**
 * Local filesystem or working-directory failure
 */
export class IoError extends OperationError {
  constructor(message: string, cause?: unknown) {
    super(message, 'IO_ERROR', { cause })
    this.name = 'IoError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isEdgectlError(error: unknown): error is EdgectlError {
  return error instanceof EdgectlError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isEdgectlError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
