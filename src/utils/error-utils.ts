/**
 * Utility functions and error classes shared by the converter and the CLI.
 */

/**
 * Extracts a string message from any error value.
 * Handles Error instances, strings, numbers, null, undefined, and objects.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Wraps an error with additional context, preserving the original error as cause.
 */
export function wrapError(error: unknown, context: string): Error {
  const message = `${context}: ${getErrorMessage(error)}`;
  if (error instanceof Error) {
    return new Error(message, { cause: error });
  }
  return new Error(message);
}

export type TConversionErrorCode = 'DOCUMENT_MALFORMED' | 'NO_WORKFLOW' | 'GENERATION_FAILED';

/**
 * Raised by the stateful session when an operation needs a published workflow
 * or a document cannot be converted.
 */
export class ConversionError extends Error {
  readonly code: TConversionErrorCode;

  constructor(code: TConversionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConversionError';
    this.code = code;
  }
}

/** Invalid configuration file, environment value or CLI override. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
