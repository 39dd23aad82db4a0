/**
 * Type definitions for the field encryption module.
 */

/**
 * Scopes a field's ciphertext, e.g. `user:email` or `session:ip_address`.
 * The same context must be supplied on decrypt. `''` means no context.
 */
export type EncryptionContext = string;

export interface CiphertextEnvelope {
  remoteCiphertext: string;
  /** Lowercase hex HMAC-SHA256 over `remoteCiphertext`; absent for legacy values. */
  tag?: string;
}

/** Per-call options. An aborted signal cancels the in-flight remote call. */
export interface CallOptions {
  signal?: AbortSignal;
}

export interface KeyServiceBatchItem {
  value: string;
  context?: EncryptionContext;
}

export type KeyServiceBatchResult = { value: string } | { error: string };

/** Well-known contexts used by the repositories in this package. */
export const FIELD_CONTEXTS = {
  SESSION_ID: 'session:session_id',
  SESSION_IP_ADDRESS: 'session:ip_address',
  CUSTOMER_NAME: 'customer:name',
  CUSTOMER_PHONE: 'customer:phone',
  CUSTOMER_EMAIL: 'customer:email',
} as const;
