/**
 * Search Hasher
 *
 * Deterministic keyed hash for lookup columns (`email_hash`, `token_hash`).
 * Equal inputs give equal hashes; the secret is independent of the key
 * service so lookups keep working when it is unreachable.
 *
 * @module encryption/searchHasher
 */

import { createHmac } from 'node:crypto';
import { ConfigurationMissingError } from './errors.js';

export class SearchHasher {
  private readonly secret: Buffer;

  constructor(secret: string) {
    if (secret.trim() === '') {
      throw new ConfigurationMissingError(['SEARCH_HASH_SECRET']);
    }
    this.secret = Buffer.from(secret, 'utf8');
  }

  /** Hex HMAC-SHA256 of `value`. Callers normalize (trim, lowercase) first. */
  hash(value: string): string {
    return createHmac('sha256', this.secret).update(value, 'utf8').digest('hex');
  }
}
