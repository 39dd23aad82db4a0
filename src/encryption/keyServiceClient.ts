/**
 * Key service abstraction.
 *
 * The key service is an opaque remote encrypt/decrypt capability bound to a
 * named key. Ciphertext it returns is treated as an opaque token here. In
 * production this is Vault's Transit engine ({@link VaultTransitClient});
 * tests and local development use {@link InMemoryKeyService}.
 *
 * Implementations must:
 * - reject with `RemoteServiceError` (or a subclass) on any failure
 * - reject with the signal's reason, unwrapped, when `options.signal` aborts
 * - return batch results of the same length and order as the input
 */

import type {
  CallOptions,
  EncryptionContext,
  KeyServiceBatchItem,
  KeyServiceBatchResult,
} from './types.js';

export interface KeyServiceClient {
  /** Name of the remote key every call is made under. */
  readonly keyName: string;

  encrypt(plaintext: string, context: EncryptionContext, options?: CallOptions): Promise<string>;

  decrypt(ciphertext: string, context: EncryptionContext, options?: CallOptions): Promise<string>;

  /** A per-item `error` result fails only that item. */
  encryptBatch(
    items: readonly KeyServiceBatchItem[],
    options?: CallOptions,
  ): Promise<KeyServiceBatchResult[]>;

  decryptBatch(
    items: readonly KeyServiceBatchItem[],
    options?: CallOptions,
  ): Promise<KeyServiceBatchResult[]>;
}
