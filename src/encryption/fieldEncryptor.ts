/**
 * Field Encryptor
 *
 * Per-field encryption API used by repositories. Composes the key service,
 * integrity tags and the envelope format:
 *
 *   write: plaintext → keyService.encrypt → tag → `<ciphertext>:<tag>`
 *   read:  envelope → parse → verify tag → keyService.decrypt → plaintext
 *
 * Empty strings mean "no value" and never reach the key service. A tag that
 * does not verify fails the call before any remote request is made.
 *
 * Construct one instance in the composition root and inject it wherever
 * fields are encrypted.
 *
 * @module encryption/fieldEncryptor
 */

import { parseEnvelope, serializeEnvelope } from './envelope.js';
import {
  IntegrityViolationError,
  LengthMismatchError,
  MalformedEnvelopeError,
  RemoteServiceError,
} from './errors.js';
import { IntegrityKeyring } from './integrityTag.js';
import type { KeyServiceClient } from './keyServiceClient.js';
import type {
  CallOptions,
  CiphertextEnvelope,
  EncryptionContext,
  KeyServiceBatchItem,
  KeyServiceBatchResult,
} from './types.js';
import { createLogger, type Logger } from '../logging/logger.js';

/** The operations repositories depend on; satisfied by {@link FieldEncryptor}. */
export interface FieldCipher {
  encrypt(plaintext: string, options?: CallOptions): Promise<string>;
  encryptWithContext(
    plaintext: string,
    context: EncryptionContext,
    options?: CallOptions,
  ): Promise<string>;
  decrypt(envelope: string, options?: CallOptions): Promise<string>;
  decryptWithContext(
    envelope: string,
    context: EncryptionContext,
    options?: CallOptions,
  ): Promise<string>;
  encryptBatch(
    plaintexts: readonly string[],
    contexts?: readonly EncryptionContext[],
    options?: CallOptions,
  ): Promise<string[]>;
  decryptBatch(
    envelopes: readonly string[],
    contexts?: readonly EncryptionContext[],
    options?: CallOptions,
  ): Promise<string[]>;
}

export interface FieldEncryptorConfig {
  keyService: KeyServiceClient;
  /**
   * Integrity secrets. Defaults to a keyring derived from the key service's
   * key name alone.
   */
  integrity?: IntegrityKeyring;
  logger?: Logger;
}

export interface BestEffortOptions extends CallOptions {
  /** Value returned when the key service fails. Defaults to `''`. */
  fallback?: string;
  /** Field name recorded in the warning. */
  field?: string;
}

interface PendingSlot {
  index: number;
  item: KeyServiceBatchItem;
}

export class FieldEncryptor implements FieldCipher {
  private readonly keyService: KeyServiceClient;
  private readonly integrity: IntegrityKeyring;
  private readonly logger: Logger;

  constructor(config: FieldEncryptorConfig) {
    this.keyService = config.keyService;
    this.integrity = config.integrity ?? IntegrityKeyring.fromKeyNames(config.keyService.keyName);
    this.logger = (config.logger ?? createLogger()).child({ operation: 'field-encryption' });
  }

  async encrypt(plaintext: string, options?: CallOptions): Promise<string> {
    return this.encryptWithContext(plaintext, '', options);
  }

  async encryptWithContext(
    plaintext: string,
    context: EncryptionContext,
    options?: CallOptions,
  ): Promise<string> {
    if (plaintext === '') return '';

    const remoteCiphertext = await this.keyService.encrypt(plaintext, context, options);
    return this.seal(remoteCiphertext);
  }

  async decrypt(envelope: string, options?: CallOptions): Promise<string> {
    return this.decryptWithContext(envelope, '', options);
  }

  /**
   * Decrypt an envelope written under `context`. A wrong context is rejected
   * by the key service; it is never silently tolerated here.
   */
  async decryptWithContext(
    envelope: string,
    context: EncryptionContext,
    options?: CallOptions,
  ): Promise<string> {
    if (envelope === '') return '';

    const remoteCiphertext = this.open(envelope, context);
    return this.keyService.decrypt(remoteCiphertext, context, options);
  }

  /**
   * Encrypt many values in one remote call. Empty values stay empty and take
   * no remote slot; output position `i` always corresponds to input `i`.
   */
  async encryptBatch(
    plaintexts: readonly string[],
    contexts?: readonly EncryptionContext[],
    options?: CallOptions,
  ): Promise<string[]> {
    const resolvedContexts = resolveContexts(plaintexts.length, contexts);

    const pending: PendingSlot[] = [];
    plaintexts.forEach((value, index) => {
      if (value === '') return;
      pending.push({ index, item: { value, context: resolvedContexts[index] ?? '' } });
    });

    const output: string[] = plaintexts.map(() => '');
    if (pending.length === 0) return output;

    const results = await this.keyService.encryptBatch(
      pending.map((slot) => slot.item),
      options,
    );
    const values = unwrapBatch(results, pending, 'encrypt');
    pending.forEach((slot, i) => {
      output[slot.index] = this.seal(values[i] ?? '');
    });
    return output;
  }

  /**
   * Decrypt many envelopes in one remote call. Every tag is verified before
   * the call is made; a single failure aborts the whole batch.
   */
  async decryptBatch(
    envelopes: readonly string[],
    contexts?: readonly EncryptionContext[],
    options?: CallOptions,
  ): Promise<string[]> {
    const resolvedContexts = resolveContexts(envelopes.length, contexts);

    const pending: PendingSlot[] = [];
    envelopes.forEach((envelope, index) => {
      if (envelope === '') return;
      const context = resolvedContexts[index] ?? '';
      pending.push({ index, item: { value: this.open(envelope, context, index), context } });
    });

    const output: string[] = envelopes.map(() => '');
    if (pending.length === 0) return output;

    const results = await this.keyService.decryptBatch(
      pending.map((slot) => slot.item),
      options,
    );
    const values = unwrapBatch(results, pending, 'decrypt');
    pending.forEach((slot, i) => {
      output[slot.index] = values[i] ?? '';
    });
    return output;
  }

  /**
   * Decrypt for display-only reads (report rows, dashboards). A key service
   * failure yields `fallback` and a warning; integrity and format failures
   * still throw. Never use for identity, authorization or amounts.
   */
  async decryptBestEffort(
    envelope: string,
    context: EncryptionContext,
    options: BestEffortOptions = {},
  ): Promise<string> {
    try {
      return await this.decryptWithContext(envelope, context, options);
    } catch (err) {
      if (!(err instanceof RemoteServiceError)) throw err;
      this.logger.warn('Decrypt failed for display-only field; using fallback value', {
        field: options.field,
        context,
        errorCode: err.code,
        retryable: err.retryable,
      });
      return options.fallback ?? '';
    }
  }

  // --- Internal helpers ---

  private seal(remoteCiphertext: string): string {
    return serializeEnvelope(remoteCiphertext, this.integrity.sign(remoteCiphertext));
  }

  /** Parse and verify an envelope, returning the remote ciphertext. */
  private open(envelope: string, context: EncryptionContext, index?: number): string {
    let parsed: CiphertextEnvelope;
    try {
      parsed = parseEnvelope(envelope);
    } catch (err) {
      if (err instanceof MalformedEnvelopeError && index !== undefined) {
        throw new MalformedEnvelopeError(err.reason, index);
      }
      throw err;
    }

    if (parsed.tag !== undefined && !this.integrity.verify(parsed.remoteCiphertext, parsed.tag)) {
      const violation = new IntegrityViolationError(index);
      this.logger.error('Envelope integrity verification failed', violation, {
        context,
        batchIndex: index,
      });
      throw violation;
    }
    return parsed.remoteCiphertext;
  }
}

// ─── Batch helpers ───────────────────────────────────────────────────────────

function resolveContexts(
  length: number,
  contexts: readonly EncryptionContext[] | undefined,
): readonly EncryptionContext[] {
  if (contexts === undefined) return new Array<EncryptionContext>(length).fill('');
  if (contexts.length !== length) {
    throw new LengthMismatchError(length, contexts.length);
  }
  return contexts;
}

/**
 * Map remote batch results back to plain values. Any per-item error, or a
 * result count that differs from the request, fails the whole batch.
 */
function unwrapBatch(
  results: readonly KeyServiceBatchResult[],
  pending: readonly PendingSlot[],
  operation: 'encrypt' | 'decrypt',
): string[] {
  if (results.length !== pending.length) {
    throw new RemoteServiceError(
      `Key service batch ${operation} returned ${results.length} results for ${pending.length} items`,
    );
  }

  return results.map((result, i) => {
    const index = pending[i]?.index ?? i;
    if ('error' in result) {
      throw new RemoteServiceError(`Batch ${operation} item ${index} failed: ${result.error}`, {
        index,
      });
    }
    return result.value;
  });
}
