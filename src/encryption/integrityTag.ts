/**
 * Integrity tags over remote ciphertext.
 *
 * A tag is HMAC-SHA256 over the key service's ciphertext, rendered as
 * lowercase hex. It lets a reader reject tampered or corrupted stored values
 * before spending a remote decrypt call.
 *
 * @module encryption/integrityTag
 */

import { createHash, createHmac, timingSafeEqual } from 'node:crypto';

/** Length of a hex-rendered HMAC-SHA256 tag. */
export const TAG_HEX_LENGTH = 64;

const SECRET_SUFFIX = '-hmac-secret';

/**
 * Derive the integrity secret for a named remote key. The result only ever
 * lives in memory.
 */
export function deriveIntegritySecret(keyName: string): Buffer {
  return createHash('sha256')
    .update(keyName + SECRET_SUFFIX, 'utf8')
    .digest();
}

export function computeTag(secret: Buffer, ciphertext: string): string {
  return createHmac('sha256', secret).update(ciphertext, 'utf8').digest('hex');
}

/**
 * Constant-time check of `tag` against the expected lowercase hex tag.
 * Tags in any other rendering (including upper-case hex) do not verify.
 */
export function verifyTag(secret: Buffer, ciphertext: string, tag: string): boolean {
  const expected = Buffer.from(computeTag(secret, ciphertext), 'utf8');
  const provided = Buffer.from(tag, 'utf8');
  if (provided.length !== expected.length) return false;
  return timingSafeEqual(provided, expected);
}

// ─── Keyring ─────────────────────────────────────────────────────────────────

/**
 * Ordered set of integrity secrets. The first secret signs new tags; every
 * secret is tried when verifying, so tags written before a rotation keep
 * verifying until their secret is dropped from the list.
 */
export class IntegrityKeyring {
  private readonly secrets: readonly Buffer[];

  constructor(current: Buffer, previous: readonly Buffer[] = []) {
    this.secrets = [current, ...previous];
  }

  /** Keyring for a remote key name and any key names it replaced. */
  static fromKeyNames(current: string, previous: readonly string[] = []): IntegrityKeyring {
    return new IntegrityKeyring(
      deriveIntegritySecret(current),
      previous.map((name) => deriveIntegritySecret(name)),
    );
  }

  get size(): number {
    return this.secrets.length;
  }

  sign(ciphertext: string): string {
    // The constructor guarantees at least one secret.
    const [current] = this.secrets;
    if (!current) throw new Error('IntegrityKeyring has no signing secret');
    return computeTag(current, ciphertext);
  }

  verify(ciphertext: string, tag: string): boolean {
    let matched = false;
    for (const secret of this.secrets) {
      // No early exit: every secret is checked regardless of the outcome.
      if (verifyTag(secret, ciphertext, tag)) matched = true;
    }
    return matched;
  }
}
