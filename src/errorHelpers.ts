// src/errorHelpers.ts - Error kinds and error handling utilities

export type ConversionErrorKind =
  | 'FileNotFound'
  | 'IOError'
  | 'UnsupportedInput'
  | 'CorruptFile'
  | 'ConfigError';

/**
 * Base class for every failure a conversion surfaces to its caller.
 * Nothing is retried or recovered internally.
 */
export class ConversionError extends Error {
  readonly kind: ConversionErrorKind;

  constructor(kind: ConversionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
  }
}

export class FileNotFoundError extends ConversionError {
  readonly path: string;

  constructor(filePath: string) {
    super('FileNotFound', `File not found: ${filePath}`);
    this.path = filePath;
  }
}

export class IOError extends ConversionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('IOError', message, options);
  }
}

export class UnsupportedInputError extends ConversionError {
  constructor(message: string) {
    super('UnsupportedInput', message);
  }
}

export class CorruptFileError extends ConversionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CorruptFile', message, options);
  }
}

export class ConfigError extends ConversionError {
  constructor(message: string) {
    super('ConfigError', message);
  }
}

/**
 * Type guard for errors with a message property
 */
export function isErrorWithMessage(error: unknown): error is { message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof (error as { message: unknown }).message === 'string'
  );
}

/** Type guard for Node.js file system errors */
export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function isConversionError(error: unknown): error is ConversionError {
  return error instanceof ConversionError;
}

/**
 * Get error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (isErrorWithMessage(error)) {
    return error.message;
  }
  return String(error);
}

/**
 * Map a file system error on `filePath` to a conversion error kind
 */
export function toFileError(error: unknown, filePath: string, action: 'read' | 'write'): ConversionError {
  if (isConversionError(error)) {
    return error;
  }
  if (isNodeError(error) && error.code === 'ENOENT' && action === 'read') {
    return new FileNotFoundError(filePath);
  }
  return new IOError(`Cannot ${action} ${filePath}: ${getErrorMessage(error)}`, { cause: error });
}

/**
 * Get error details for logging
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
  if (!isConversionError(error)) {
    return { message: getErrorMessage(error) };
  }

  return {
    kind: error.kind,
    message: error.message,
    cause: error.cause === undefined ? undefined : getErrorMessage(error.cause),
  };
}

/**
 * Format an error for the command line
 */
export function formatCliError(error: unknown): string {
  return `Error: ${getErrorMessage(error)}`;
}
