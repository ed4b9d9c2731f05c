/**
 * Custom error types for the NMEA sentence SDK
 * @module errors
 */

/**
 * Failure categories. Each maps to exactly one error class.
 */
export type NmeaErrorKind =
  | 'oversized'
  | 'malformed'
  | 'checksum-format'
  | 'checksum-mismatch'
  | 'message-id-mismatch'
  | 'grammar';

/**
 * Base error class for sentence decoding errors.
 */
export abstract class NmeaError extends Error {
  /** Category of this failure */
  abstract readonly kind: NmeaErrorKind;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    // Maintains proper stack trace for where error was thrown (V8 engines)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when input exceeds the sentence length ceiling.
 */
export class SentenceTooLongError extends NmeaError {
  readonly kind = 'oversized';

  constructor(
    public readonly length: number,
    public readonly maxLength: number
  ) {
    super(`Sentence is ${String(length)} bytes, longer than the ${String(maxLength)} byte limit`);
  }
}

/**
 * Error thrown when the sentence envelope is structurally broken
 * (missing `$` or `*`, truncated ids, trailing garbage).
 */
export class MalformedSentenceError extends NmeaError {
  readonly kind = 'malformed';

  constructor(
    message: string,
    public readonly rawData?: string
  ) {
    super(`Malformed sentence: ${message}`);
  }
}

/**
 * Error thrown when the checksum suffix is not two hex digits.
 */
export class ChecksumFormatError extends NmeaError {
  readonly kind = 'checksum-format';

  constructor(public readonly rawChecksum: string) {
    super(`Checksum '${rawChecksum}' is not a two-digit hex number`);
  }
}

/**
 * Error thrown when the computed checksum differs from the declared one.
 */
export class ChecksumMismatchError extends NmeaError {
  readonly kind = 'checksum-mismatch';

  constructor(
    public readonly declared: number,
    public readonly computed: number
  ) {
    super(`Checksum mismatch: declared ${toHex(declared)}, computed ${toHex(computed)}`);
  }
}

/**
 * Error thrown when a grammar decoder is handed a sentence of another type.
 */
export class MessageIdMismatchError extends NmeaError {
  readonly kind = 'message-id-mismatch';

  constructor(
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(`Expected a ${expected} sentence, got ${actual}`);
  }
}

/**
 * Error thrown when a sentence payload breaks its grammar.
 */
export class ParseError extends NmeaError {
  readonly kind = 'grammar';

  constructor(
    message: string,
    public readonly messageId: string,
    public readonly field?: string,
    public readonly rawData?: string
  ) {
    const fullMessage = field !== undefined
      ? `Parse error in ${messageId} field '${field}': ${message}`
      : `Parse error in ${messageId}: ${message}`;
    super(fullMessage);
  }
}

function toHex(value: number): string {
  return value.toString(16).toUpperCase().padStart(2, '0');
}

/**
 * Type guard to check if an error is an NmeaError.
 */
export function isNmeaError(error: unknown): error is NmeaError {
  return error instanceof NmeaError;
}

/**
 * Type guard for either checksum failure.
 */
export function isChecksumError(
  error: unknown
): error is ChecksumFormatError | ChecksumMismatchError {
  return error instanceof ChecksumFormatError || error instanceof ChecksumMismatchError;
}
