/**
 * CLI error classes with actionable suggestions
 *
 * Engine failures never surface here: the docs bridge reports them as issues
 * inside its report. These errors cover the shell around it (settings,
 * arguments, the filesystem outside the bridge).
 */

/** All possible error codes for categorization */
export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'CONFIG_PARSE_ERROR'
  | 'CONFIG_PERMISSION_DENIED'
  | 'CONFIG_TIMEOUT'
  | 'BRIDGE_CONFIG_EXISTS'
  | 'PROJECT_NOT_FOUND'
  | 'FILE_NOT_FOUND'
  | 'FILE_READ_ERROR'
  | 'FILE_WRITE_ERROR'
  | 'PERMISSION_DENIED'
  | 'DIRECTORY_NOT_FOUND'
  | 'INTERRUPTED'
  | 'INVALID_INPUT'
  | 'VERSION_MISMATCH'
  | 'UNKNOWN_ERROR';

/** Error severity levels */
export type ErrorSeverity = 'fatal' | 'error' | 'warning' | 'info';

/** Context information for debugging */
export interface ErrorContext {
  file?: string;
  operation?: string;
}

interface ErrorDefaults {
  message: string;
  suggestions: string[];
  severity: ErrorSeverity;
}

const ERROR_DEFAULTS: Readonly<Record<ErrorCode, ErrorDefaults>> = {
  CONFIG_INVALID: {
    message: 'Configuration file is invalid',
    suggestions: [
      'Check your steward.config.json or .stewardrc for typos',
      'Run `steward docs diagnose --verbose` to see which setting failed',
    ],
    severity: 'error',
  },
  CONFIG_PARSE_ERROR: {
    message: 'Failed to parse configuration file',
    suggestions: ['Check the file for JSON/YAML syntax errors', 'Ensure the file exports a plain object'],
    severity: 'error',
  },
  CONFIG_PERMISSION_DENIED: {
    message: 'Cannot read configuration file - permission denied',
    suggestions: ['Check file permissions on the configuration file'],
    severity: 'error',
  },
  CONFIG_TIMEOUT: {
    message: 'Loading the configuration timed out',
    suggestions: ['Check that a JavaScript config does not block on I/O', 'Use a JSON or YAML config instead'],
    severity: 'error',
  },
  BRIDGE_CONFIG_EXISTS: {
    message: 'A docs bridge configuration already exists',
    suggestions: ['Edit the existing file', 'Run `steward docs init --force` to overwrite it'],
    severity: 'error',
  },
  PROJECT_NOT_FOUND: {
    message: 'Project root not found',
    suggestions: ['Check the value passed to --root', 'Run the command from inside the project'],
    severity: 'error',
  },
  FILE_NOT_FOUND: {
    message: 'File not found',
    suggestions: ['Check that the file path is correct', 'Verify case sensitivity of the filename'],
    severity: 'error',
  },
  FILE_READ_ERROR: {
    message: 'Failed to read file',
    suggestions: ['Check file permissions', 'Verify the file encoding is UTF-8'],
    severity: 'error',
  },
  FILE_WRITE_ERROR: {
    message: 'Failed to write file',
    suggestions: ['Check write permissions on the directory', 'Ensure there is sufficient disk space'],
    severity: 'error',
  },
  PERMISSION_DENIED: {
    message: 'Permission denied',
    suggestions: ['Check file/directory permissions', 'Verify ownership of the files'],
    severity: 'error',
  },
  DIRECTORY_NOT_FOUND: {
    message: 'Directory not found',
    suggestions: ['Check that the directory path is correct', 'Create the directory if it should exist'],
    severity: 'error',
  },
  INTERRUPTED: {
    message: 'Operation was interrupted',
    suggestions: ['The process received a termination signal', 'Run the command again to retry'],
    severity: 'fatal',
  },
  INVALID_INPUT: {
    message: 'Invalid input provided',
    suggestions: ['Check the command syntax with --help', 'Verify all required options are provided'],
    severity: 'error',
  },
  VERSION_MISMATCH: {
    message: 'Unsupported Node.js version',
    suggestions: ['Upgrade Node.js to version 20 or higher'],
    severity: 'fatal',
  },
  UNKNOWN_ERROR: {
    message: 'An unexpected error occurred',
    suggestions: ['Run with --verbose for more details', 'Report this issue if it persists'],
    severity: 'error',
  },
};

/**
 * Custom error class with actionable suggestions and rich context
 */
export class CliError extends Error {
  public readonly code: ErrorCode;
  public readonly suggestions: string[];
  public readonly cause?: Error;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;

  constructor(
    message: string,
    code: ErrorCode,
    options?: {
      suggestions?: string[];
      cause?: Error;
      severity?: ErrorSeverity;
      context?: ErrorContext;
    }
  ) {
    super(message);
    this.name = 'CliError';
    this.code = code;
    this.suggestions = options?.suggestions ?? [];
    this.cause = options?.cause;
    this.severity = options?.severity ?? ERROR_DEFAULTS[code].severity;
    this.context = options?.context ?? {};

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CliError);
    }
  }

  /**
   * Create error with the default message and suggestions of a code
   */
  static fromCode(code: ErrorCode, message?: string, options?: { cause?: Error; context?: ErrorContext }): CliError {
    const defaults = ERROR_DEFAULTS[code];
    return new CliError(message ?? defaults.message, code, {
      suggestions: defaults.suggestions,
      cause: options?.cause,
      context: options?.context,
      severity: defaults.severity,
    });
  }

  withContext(context: Partial<ErrorContext>): CliError {
    return new CliError(this.message, this.code, {
      suggestions: this.suggestions,
      cause: this.cause,
      severity: this.severity,
      context: { ...this.context, ...context },
    });
  }
}

/**
 * Type guard to check if an error is a CliError
 */
export function isCliError(error: unknown): error is CliError {
  return error instanceof CliError;
}

/**
 * Wrap unknown errors in CliError with automatic code detection
 */
export function wrapError(error: unknown, context?: ErrorContext): CliError {
  if (isCliError(error)) {
    return context ? error.withContext(context) : error;
  }

  if (error instanceof Error) {
    const code = detectErrorCode(error);
    return new CliError(error.message, code, {
      cause: error,
      context,
      suggestions: code === 'UNKNOWN_ERROR' ? [] : ERROR_DEFAULTS[code].suggestions,
    });
  }

  return new CliError(String(error), 'UNKNOWN_ERROR', { context });
}

/**
 * Detect appropriate error code from native Error
 */
function detectErrorCode(error: Error): ErrorCode {
  if ('code' in error) {
    switch (error.code) {
      case 'ENOENT':
        return 'FILE_NOT_FOUND';
      case 'EACCES':
      case 'EPERM':
        return 'PERMISSION_DENIED';
      case 'ENOTDIR':
        return 'DIRECTORY_NOT_FOUND';
      case 'EISDIR':
        return 'FILE_READ_ERROR';
      case 'ENOSPC':
      case 'EROFS':
        return 'FILE_WRITE_ERROR';
    }
  }

  if (error.name === 'SyntaxError') {
    return 'CONFIG_PARSE_ERROR';
  }

  return 'UNKNOWN_ERROR';
}

/**
 * Wrap an operation with a timeout
 */
export async function withTimeout<T>(
  operation: () => Promise<T>,
  timeoutMs: number,
  errorCode: ErrorCode = 'CONFIG_TIMEOUT'
): Promise<T> {
  return new Promise((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      reject(CliError.fromCode(errorCode, `Operation timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    operation()
      .then((result) => {
        clearTimeout(timeoutId);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timeoutId);
        reject(wrapError(error));
      });
  });
}

/**
 * Assert that a value is defined (not null or undefined)
 */
export function assertDefined<T>(
  value: T | null | undefined,
  message: string,
  code: ErrorCode = 'INVALID_INPUT'
): asserts value is T {
  if (value === null || value === undefined) {
    throw CliError.fromCode(code, message);
  }
}
