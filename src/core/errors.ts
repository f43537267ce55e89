/**
 * Error Handling: Custom error types for conversion failures
 */

/**
 * Failure categories. Everything except `InvalidConfiguration` and a missing
 * top-level data directory is recoverable at the file or subject level.
 */
export type ConversionErrorKind =
  | 'MissingInput'
  | 'UnparsableHeader'
  | 'ExternalToolFailure'
  | 'FilenamePatternMismatch'
  | 'PostConversionFileMissing'
  | 'OutputNameCollision'
  | 'InvalidConfiguration';

/**
 * Custom error for PAR/REC conversion failures
 */
export class ParRecError extends Error {
  constructor(
    message: string,
    public readonly kind: ConversionErrorKind,
    public readonly filePath?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ParRecError';
  }
}

/**
 * Raised when the external converter exits non-zero or cannot be started
 */
export class ExternalToolError extends ParRecError {
  constructor(
    message: string,
    filePath: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    cause?: Error
  ) {
    super(message, 'ExternalToolFailure', filePath, cause);
    this.name = 'ExternalToolError';
  }
}

/**
 * Create a conversion error with file context
 */
export function createConversionError(
  message: string,
  kind: ConversionErrorKind,
  filePath?: string,
  cause?: Error
): ParRecError {
  let fullMessage = message;
  if (filePath) {
    fullMessage += ` (file: ${filePath})`;
  }
  if (cause) {
    fullMessage += `: ${cause.message}`;
  }
  return new ParRecError(fullMessage, kind, filePath, cause);
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
