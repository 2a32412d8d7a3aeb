/**
 * Conversion error taxonomy
 */

export type ConversionErrorKind =
  | 'NotFound'
  | 'ParseError'
  | 'EncodingError'
  | 'InvalidOption';

export abstract class ConversionError extends Error {
  abstract readonly kind: ConversionErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends ConversionError {
  readonly kind = 'NotFound';

  constructor(readonly path: string) {
    super(`CSV file not found: ${path}`);
  }
}

export class ParseError extends ConversionError {
  readonly kind = 'ParseError';
}

export class EncodingError extends ConversionError {
  readonly kind = 'EncodingError';
}

export class InvalidOptionError extends ConversionError {
  readonly kind = 'InvalidOption';
}

export function isConversionError(error: unknown): error is ConversionError {
  return error instanceof ConversionError;
}

export function errorMessage(error: unknown): string {
  if (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  ) {
    return error.message;
  }
  return String(error);
}
