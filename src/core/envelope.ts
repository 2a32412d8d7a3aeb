/**
 * Uniform tool results. Core code throws; tool handlers turn outcomes into
 * these envelopes so nothing escapes to the remote caller as a raw fault.
 */

import {
  ConversionErrorKind,
  errorMessage,
  isConversionError,
} from './errors.js';

export type FailureKind = ConversionErrorKind | 'Unknown';

export interface FailureEnvelope {
  success: false;
  error_type: FailureKind;
  error: string;
  message: string;
}

export type SuccessEnvelope<T extends object> = { success: true; message: string } & T;

export type Envelope<T extends object> = SuccessEnvelope<T> | FailureEnvelope;

export const FAILURE_MESSAGES: Record<FailureKind, string> = {
  NotFound: 'File not found',
  ParseError: 'CSV parse error',
  EncodingError: 'File encoding error',
  InvalidOption: 'Invalid option',
  Unknown: 'Unknown error',
};

export function toFailureEnvelope(error: unknown): FailureEnvelope {
  const kind: FailureKind = isConversionError(error) ? error.kind : 'Unknown';
  return {
    success: false,
    error_type: kind,
    error: errorMessage(error),
    message: FAILURE_MESSAGES[kind],
  };
}

export function toSuccessEnvelope<T extends object>(
  message: string,
  payload: T
): SuccessEnvelope<T> {
  const head: { success: true } = { success: true };
  return { ...head, ...payload, message };
}
