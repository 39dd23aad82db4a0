/**
 * Display masking for decrypted PII shown in the UI.
 *
 * Total functions: malformed input degrades to a placeholder, never throws.
 * Masked values are never stored or compared; lookups go through the
 * search hash.
 *
 * @module utils/displayMasker
 */

const MASK = '***';
const PHONE_MASK = '******';

/** `John` → `J***`; empty → `***`. */
export function maskName(name: string): string {
  const first = Array.from(name)[0];
  return first === undefined ? MASK : first + MASK;
}

/** `+628123456789` → `******6789`; fewer than four characters → `******`. */
export function maskPhone(phone: string): string {
  const chars = Array.from(phone);
  if (chars.length < 4) return PHONE_MASK;
  return PHONE_MASK + chars.slice(-4).join('');
}

/** `user@example.com` → `u***@example.com`. */
export function maskEmail(email: string): string {
  const at = email.indexOf('@');
  if (at === -1) return MASK;

  const local = email.slice(0, at);
  const domain = email.slice(at + 1);
  const first = Array.from(local)[0];
  return first === undefined ? `${MASK}@${domain}` : `${first}${MASK}@${domain}`;
}
