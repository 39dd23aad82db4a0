/**
 * Typed errors for the field encryption layer.
 *
 * Every error carries a stable `code` so HTTP-facing callers can map it to a
 * status without inspecting messages. Messages never contain plaintext or
 * ciphertext.
 *
 * @module encryption/errors
 */

export type FieldCryptoErrorCode =
  | 'INTEGRITY_VIOLATION'
  | 'REMOTE_SERVICE_ERROR'
  | 'NO_CIPHERTEXT_RETURNED'
  | 'CONTEXT_MISMATCH'
  | 'MALFORMED_ENVELOPE'
  | 'LENGTH_MISMATCH'
  | 'CONFIGURATION_MISSING';

export abstract class FieldCryptoError extends Error {
  abstract readonly code: FieldCryptoErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * An integrity tag was present and did not match its ciphertext.
 * Treated as tampering or corruption; never retried.
 */
export class IntegrityViolationError extends FieldCryptoError {
  readonly code = 'INTEGRITY_VIOLATION';

  constructor(public readonly index?: number) {
    super(
      index === undefined
        ? 'Integrity verification failed: ciphertext was modified or corrupted'
        : `Integrity verification failed for batch item ${index}`,
    );
  }
}

export interface RemoteServiceErrorOptions {
  retryable?: boolean;
  status?: number;
  index?: number;
  cause?: unknown;
}

/** The key service failed or answered with something unusable. */
export class RemoteServiceError extends FieldCryptoError {
  readonly code: FieldCryptoErrorCode = 'REMOTE_SERVICE_ERROR';
  readonly retryable: boolean;
  readonly status?: number;
  readonly index?: number;

  constructor(message: string, options: RemoteServiceErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.retryable = options.retryable ?? false;
    this.status = options.status;
    this.index = options.index;
  }
}

/** The encrypt call succeeded but the response carried no ciphertext. */
export class NoCiphertextReturnedError extends RemoteServiceError {
  override readonly code = 'NO_CIPHERTEXT_RETURNED';

  constructor(message = 'Key service returned no ciphertext') {
    super(message, { retryable: false });
  }
}

/** The key service rejected the encryption context supplied on decrypt. */
export class ContextMismatchError extends RemoteServiceError {
  override readonly code = 'CONTEXT_MISMATCH';

  constructor(message = 'Key service rejected the encryption context', status?: number) {
    super(message, { retryable: false, status });
  }
}

export type MalformedEnvelopeReason = 'EMPTY_AFTER_TAG_STRIP';

/** Stored data is structurally invalid. Surfaced, never repaired. */
export class MalformedEnvelopeError extends FieldCryptoError {
  readonly code = 'MALFORMED_ENVELOPE';

  constructor(
    public readonly reason: MalformedEnvelopeReason = 'EMPTY_AFTER_TAG_STRIP',
    public readonly index?: number,
  ) {
    super(
      index === undefined
        ? 'Malformed envelope: integrity tag has no ciphertext'
        : `Malformed envelope at batch item ${index}: integrity tag has no ciphertext`,
    );
  }
}

/** Batch inputs of unequal length. A programming error; fail fast. */
export class LengthMismatchError extends FieldCryptoError {
  readonly code = 'LENGTH_MISMATCH';

  constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(`Batch contexts length ${actual} does not match values length ${expected}`);
  }
}

/** Required configuration is absent. Fatal at startup. */
export class ConfigurationMissingError extends FieldCryptoError {
  readonly code = 'CONFIGURATION_MISSING';

  constructor(public readonly missing: string[]) {
    super(`Missing required configuration: ${missing.join(', ')}`);
  }
}

export function isFieldCryptoError(error: unknown): error is FieldCryptoError {
  return error instanceof FieldCryptoError;
}
