/**
 * In-memory key service for development and testing.
 *
 * Mimics the Vault Transit engine closely enough for the field encryption
 * layer to be exercised without a network:
 * - ciphertext is `vault:v1:<base64(iv | tag | data)>` (AES-256-GCM)
 * - a non-empty context selects a derived key and convergent encryption, so
 *   equal plaintext and context give equal ciphertext
 * - decrypting under a different context fails authentication
 *
 * NOT for production use.
 */

import { createCipheriv, createDecipheriv, createHmac, randomBytes } from 'node:crypto';
import { RemoteServiceError } from './errors.js';
import type { KeyServiceClient } from './keyServiceClient.js';
import type {
  CallOptions,
  EncryptionContext,
  KeyServiceBatchItem,
  KeyServiceBatchResult,
} from './types.js';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;
const TAG_LENGTH = 16;
const CIPHERTEXT_PREFIX = 'vault:v1:';

export type KeyServiceOperation = 'encrypt' | 'decrypt' | 'encryptBatch' | 'decryptBatch';

/** One recorded call, with the values and contexts the service received. */
export interface KeyServiceCall {
  operation: KeyServiceOperation;
  values: string[];
  contexts: EncryptionContext[];
}

export interface InMemoryKeyServiceOptions {
  keyName?: string;
  /** 32-byte key material. Random when omitted. */
  keyMaterial?: Buffer;
  /** Artificial latency per call, for cancellation tests. */
  latencyMs?: number;
}

export class InMemoryKeyService implements KeyServiceClient {
  readonly keyName: string;
  readonly calls: KeyServiceCall[] = [];
  private readonly keyMaterial: Buffer;
  private readonly latencyMs: number;
  private enabled = true;

  constructor(options: InMemoryKeyServiceOptions = {}) {
    this.keyName = options.keyName ?? 'test-transit-key';
    this.keyMaterial = options.keyMaterial ?? randomBytes(32);
    this.latencyMs = options.latencyMs ?? 0;
    if (this.keyMaterial.length !== 32) {
      throw new Error('InMemoryKeyService key material must be 32 bytes');
    }
  }

  async encrypt(
    plaintext: string,
    context: EncryptionContext,
    options?: CallOptions,
  ): Promise<string> {
    await this.begin({ operation: 'encrypt', values: [plaintext], contexts: [context] }, options);
    return this.encryptOne(plaintext, context);
  }

  async decrypt(
    ciphertext: string,
    context: EncryptionContext,
    options?: CallOptions,
  ): Promise<string> {
    await this.begin({ operation: 'decrypt', values: [ciphertext], contexts: [context] }, options);
    return this.decryptOne(ciphertext, context);
  }

  async encryptBatch(
    items: readonly KeyServiceBatchItem[],
    options?: CallOptions,
  ): Promise<KeyServiceBatchResult[]> {
    await this.begin(toCall('encryptBatch', items), options);
    return items.map((item) => settle(() => this.encryptOne(item.value, item.context ?? '')));
  }

  async decryptBatch(
    items: readonly KeyServiceBatchItem[],
    options?: CallOptions,
  ): Promise<KeyServiceBatchResult[]> {
    await this.begin(toCall('decryptBatch', items), options);
    return items.map((item) => settle(() => this.decryptOne(item.value, item.context ?? '')));
  }

  /** Make every subsequent call fail as if the service were unreachable. */
  disable(): void {
    this.enabled = false;
  }

  enable(): void {
    this.enabled = true;
  }

  // --- Internal helpers ---

  private async begin(call: KeyServiceCall, options?: CallOptions): Promise<void> {
    options?.signal?.throwIfAborted();
    if (this.latencyMs > 0) {
      await delay(this.latencyMs, options?.signal);
    }
    this.calls.push(call);
    if (!this.enabled) {
      throw new RemoteServiceError('Key service unavailable', { retryable: true, status: 503 });
    }
  }

  private keyFor(context: EncryptionContext): Buffer {
    if (context === '') return this.keyMaterial;
    return createHmac('sha256', this.keyMaterial).update(`context:${context}`, 'utf8').digest();
  }

  private encryptOne(plaintext: string, context: EncryptionContext): string {
    const key = this.keyFor(context);
    const data = Buffer.from(plaintext, 'utf8');
    // Convergent when a context is given: the IV is derived from the plaintext.
    const iv =
      context === ''
        ? randomBytes(IV_LENGTH)
        : createHmac('sha256', key).update(data).digest().subarray(0, IV_LENGTH);

    const cipher = createCipheriv(ALGORITHM, key, iv);
    const encrypted = Buffer.concat([cipher.update(data), cipher.final()]);
    const tag = cipher.getAuthTag();

    return CIPHERTEXT_PREFIX + Buffer.concat([iv, tag, encrypted]).toString('base64');
  }

  private decryptOne(ciphertext: string, context: EncryptionContext): string {
    if (!ciphertext.startsWith(CIPHERTEXT_PREFIX)) {
      throw new RemoteServiceError('invalid ciphertext: no version prefix', { status: 400 });
    }
    const packed = Buffer.from(ciphertext.slice(CIPHERTEXT_PREFIX.length), 'base64');
    if (packed.length < IV_LENGTH + TAG_LENGTH) {
      throw new RemoteServiceError('invalid ciphertext: too short', { status: 400 });
    }

    const iv = packed.subarray(0, IV_LENGTH);
    const tag = packed.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH);
    const encrypted = packed.subarray(IV_LENGTH + TAG_LENGTH);

    const decipher = createDecipheriv(ALGORITHM, this.keyFor(context), iv);
    decipher.setAuthTag(tag);
    try {
      return Buffer.concat([decipher.update(encrypted), decipher.final()]).toString('utf8');
    } catch (err) {
      throw new RemoteServiceError('unable to decrypt: message authentication failed', {
        status: 400,
        cause: err,
      });
    }
  }
}

function toCall(
  operation: KeyServiceOperation,
  items: readonly KeyServiceBatchItem[],
): KeyServiceCall {
  return {
    operation,
    values: items.map((item) => item.value),
    contexts: items.map((item) => item.context ?? ''),
  };
}

function settle(fn: () => string): KeyServiceBatchResult {
  try {
    return { value: fn() };
  } catch (err) {
    return { error: err instanceof Error ? err.message : String(err) };
  }
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
