/**
 * Vault Transit Client
 *
 * {@link KeyServiceClient} backed by HashiCorp Vault's Transit secrets
 * engine through `node-vault`. Plaintext and context travel base64-encoded;
 * batch calls use `batch_input` / `batch_results`.
 *
 * The Vault client is injectable so tests can answer writes in-process.
 *
 * @module encryption/vaultTransitClient
 */

import NodeVault from 'node-vault';
import {
  ContextMismatchError,
  NoCiphertextReturnedError,
  RemoteServiceError,
} from './errors.js';
import type { KeyServiceClient } from './keyServiceClient.js';
import type {
  CallOptions,
  EncryptionContext,
  KeyServiceBatchItem,
  KeyServiceBatchResult,
} from './types.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface VaultTransitConfig {
  /** Vault base address, e.g. `https://vault.internal:8200`. */
  address: string;
  token: string;
  keyName: string;
  /** Transit engine mount path. Defaults to `transit`. */
  mount?: string;
  /** Per-request timeout. Defaults to 10000. */
  timeoutMs?: number;
}

/** The part of the `node-vault` client this module uses. */
export interface VaultWriter {
  write(path: string, data: Record<string, unknown>): Promise<unknown>;
}

type TransitOperation = 'encrypt' | 'decrypt';

const DEFAULT_TIMEOUT_MS = 10000;

/** Socket-level timeout codes raised by the HTTP layer under node-vault. */
const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT']);

// ─── Default Client ──────────────────────────────────────────────────────────

export function createNodeVaultWriter(config: VaultTransitConfig): VaultWriter {
  return NodeVault({
    apiVersion: 'v1',
    endpoint: config.address.replace(/\/+$/, ''),
    token: config.token,
    requestOptions: { timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS },
  });
}

// ─── Client ──────────────────────────────────────────────────────────────────

export class VaultTransitClient implements KeyServiceClient {
  readonly keyName: string;
  private readonly mount: string;
  private readonly timeoutMs: number;
  private readonly vault: VaultWriter;

  constructor(config: VaultTransitConfig, vault?: VaultWriter) {
    this.keyName = config.keyName;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.mount = (config.mount ?? 'transit').replace(/^\/+|\/+$/g, '');
    this.vault = vault ?? createNodeVaultWriter(config);
  }

  async encrypt(
    plaintext: string,
    context: EncryptionContext,
    options?: CallOptions,
  ): Promise<string> {
    const payload = withContext({ plaintext: toBase64(plaintext) }, context);
    const data = await this.write('encrypt', payload, options);
    const ciphertext = data['ciphertext'];
    if (typeof ciphertext !== 'string' || ciphertext === '') {
      throw new NoCiphertextReturnedError();
    }
    return ciphertext;
  }

  async decrypt(
    ciphertext: string,
    context: EncryptionContext,
    options?: CallOptions,
  ): Promise<string> {
    const data = await this.write('decrypt', withContext({ ciphertext }, context), options);
    const plaintext = data['plaintext'];
    if (typeof plaintext !== 'string') {
      throw new RemoteServiceError('Key service returned no plaintext');
    }
    return fromBase64(plaintext);
  }

  async encryptBatch(
    items: readonly KeyServiceBatchItem[],
    options?: CallOptions,
  ): Promise<KeyServiceBatchResult[]> {
    const batchInput = items.map((item) =>
      withContext({ plaintext: toBase64(item.value) }, item.context ?? ''),
    );
    const results = await this.writeBatch('encrypt', batchInput, options);
    return results.map((result) => {
      if (typeof result['error'] === 'string' && result['error'] !== '') {
        return { error: result['error'] };
      }
      const ciphertext = result['ciphertext'];
      if (typeof ciphertext !== 'string' || ciphertext === '') {
        return { error: 'no ciphertext returned' };
      }
      return { value: ciphertext };
    });
  }

  async decryptBatch(
    items: readonly KeyServiceBatchItem[],
    options?: CallOptions,
  ): Promise<KeyServiceBatchResult[]> {
    const batchInput = items.map((item) =>
      withContext({ ciphertext: item.value }, item.context ?? ''),
    );
    const results = await this.writeBatch('decrypt', batchInput, options);
    return results.map((result) => {
      if (typeof result['error'] === 'string' && result['error'] !== '') {
        return { error: result['error'] };
      }
      const plaintext = result['plaintext'];
      if (typeof plaintext !== 'string') {
        return { error: 'no plaintext returned' };
      }
      return { value: fromBase64(plaintext) };
    });
  }

  // --- Internal helpers ---

  private async writeBatch(
    operation: TransitOperation,
    batchInput: Record<string, string>[],
    options?: CallOptions,
  ): Promise<Record<string, unknown>[]> {
    const data = await this.write(operation, { batch_input: batchInput }, options);
    const results = data['batch_results'];
    if (!Array.isArray(results)) {
      throw new RemoteServiceError(`Key service batch ${operation} returned no results`);
    }
    return results.map((result: unknown) => (isRecord(result) ? result : {}));
  }

  /** Write to `<mount>/<operation>/<key>` and return the response's `data` object. */
  private async write(
    operation: TransitOperation,
    payload: Record<string, unknown>,
    options?: CallOptions,
  ): Promise<Record<string, unknown>> {
    const signal = options?.signal;
    signal?.throwIfAborted();

    const path = `${this.mount}/${operation}/${encodeURIComponent(this.keyName)}`;
    let body: unknown;
    try {
      body = await raceAbort(this.vault.write(path, payload), signal);
    } catch (err) {
      if (signal?.aborted) throw signal.reason;
      throw toRemoteError(operation, err, this.timeoutMs);
    }

    const data = isRecord(body) ? body['data'] : undefined;
    if (!isRecord(data)) {
      throw new RemoteServiceError(`Key service ${operation} returned no data`);
    }
    return data;
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function withContext(
  item: Record<string, string>,
  context: EncryptionContext,
): Record<string, string> {
  return context === '' ? item : { ...item, context: toBase64(context) };
}

function toBase64(value: string): string {
  return Buffer.from(value, 'utf8').toString('base64');
}

function fromBase64(value: string): string {
  return Buffer.from(value, 'base64').toString('utf8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Settle with `promise`, or reject with the signal's reason as soon as it
 * aborts. The abandoned request keeps running; its outcome is ignored.
 */
function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

interface VaultErrorResponse {
  statusCode: number;
  body: unknown;
}

/** node-vault attaches the HTTP response to errors for non-2xx answers. */
function responseOf(err: unknown): VaultErrorResponse | undefined {
  if (!(err instanceof Error) || !('response' in err)) return undefined;
  const response = err.response;
  if (!isRecord(response)) return undefined;
  const statusCode = response['statusCode'];
  if (typeof statusCode !== 'number') return undefined;
  return { statusCode, body: response['body'] };
}

function isTimeout(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false;
  return typeof err.code === 'string' && TIMEOUT_CODES.has(err.code);
}

/** Vault reports failures as `{ "errors": ["..."] }`. */
function errorMessages(body: unknown): string[] {
  if (!isRecord(body)) return [];
  const errors = body['errors'];
  if (!Array.isArray(errors)) return [];
  return errors.filter((e: unknown): e is string => typeof e === 'string');
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function toRemoteError(
  operation: TransitOperation,
  err: unknown,
  timeoutMs: number,
): RemoteServiceError {
  const response = responseOf(err);
  if (!response) {
    if (isTimeout(err)) {
      return new RemoteServiceError(`Key service ${operation} timed out after ${timeoutMs}ms`, {
        retryable: true,
        cause: err,
      });
    }
    return new RemoteServiceError(`Key service ${operation} request failed: ${describe(err)}`, {
      retryable: true,
      cause: err,
    });
  }

  const messages = errorMessages(response.body);
  const detail = messages.length > 0 ? messages.join('; ') : describe(err);
  const message = `Key service ${operation} failed (${response.statusCode}): ${detail}`;

  if (operation === 'decrypt' && messages.some((m) => /context/i.test(m))) {
    return new ContextMismatchError(message, response.statusCode);
  }

  const retryable = response.statusCode >= 500 || response.statusCode === 429;
  return new RemoteServiceError(message, { retryable, status: response.statusCode });
}
