/**
 * Log Redactor
 *
 * Masks personally identifiable information in free-text log lines and
 * structured log metadata before anything reaches a sink. Each rule leaves
 * enough of the value to correlate events (first character, last four
 * digits, first octet) while hiding the rest.
 *
 * Redaction is idempotent: running already-redacted text through the chain
 * again returns it unchanged. Every rule's output is built from `*` runs and
 * short fragments that no rule matches.
 *
 * @module logging/logRedactor
 */

// ─── Types ───────────────────────────────────────────────────────────────────

export type Replacer = string | ((match: string, ...groups: string[]) => string);

export interface RedactionPattern {
  name: string;
  pattern: RegExp;
  replacement: Replacer;
}

export interface LogRedactor {
  redact(text: string): string;
  redactObject(obj: Record<string, unknown>): Record<string, unknown>;
  addPattern(name: string, pattern: RegExp, replacement: Replacer): void;
}

// ─── Default Patterns ────────────────────────────────────────────────────────

const MASK = '***';

/** `user@example.com` → `u***@example.com` */
const EMAIL_PATTERN =
  /(?<![A-Za-z0-9._%+-])([A-Za-z0-9._%+-])[A-Za-z0-9._%+-]*@([A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)*\.[A-Za-z]{2,})\b/g;

/**
 * Digit runs with an optional leading `+` or `(` and space, dash or
 * parenthesis separators. Only runs carrying at least seven digits are
 * treated as phone numbers. Runs inside dotted quads or dash-joined
 * identifiers (IPv4 octets, UUID groups) are not phone numbers.
 */
const PHONE_PATTERN = /(?<![\w.*+(-])\+?\(?\d[\d ()-]*\d(?![\w*]|[.-]\w)/g;
const PHONE_MIN_DIGITS = 7;

/**
 * Runs of ten or more base64-ish characters, optionally glued to a
 * `token`/`key`/`secret`/`bearer` marker. Plain words are left alone unless a
 * marker is present: a token must carry a digit. A run bordered by `-` is a
 * group of a dashed identifier such as a UUID and stays as it is.
 */
const TOKEN_PATTERN =
  /(?<![A-Za-z0-9+/*-])((?:token|key|secret|bearer)[_-]?)?([A-Za-z0-9+/]{10,}={0,2})(?![A-Za-z0-9+/=*-])/gi;

const IPV4_PATTERN = /\b(\d{1,3})\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g;

/** `customer_name: John Doe` → `customer_name: J*** D***` */
const NAME_PATTERN =
  /\b(first_?name|last_?name|full_?name|customer_?name|firstName|lastName|fullName|customerName)(["'\s:=]+)([A-Z][a-z]+(?:\s+[A-Z][a-z]+)*)\b/g;

/** Field names whose values are always fully replaced. */
export const SENSITIVE_FIELD_NAMES: readonly string[] = [
  'password',
  'passwd',
  'pwd',
  'secret',
  'api_?key',
  'access_?key',
  'private_?key',
  'priv_key',
  'authorization',
  'auth',
  'access_token',
  'refresh_token',
  'token',
  'session_?id',
  'credit_card',
  'card_number',
  'cvv',
];

const SENSITIVE_FIELD_PATTERN = new RegExp(
  `(["']?)\\b(${SENSITIVE_FIELD_NAMES.join('|')})\\b(\\1)(\\s*[:=]\\s*)` +
    `("[^"]*"|'[^']*'|(?:(?:bearer|basic)\\s+)?[^"',;}&\\s]+)`,
  'gi',
);

// ─── Rule Implementations ────────────────────────────────────────────────────

function maskEmailMatch(_match: string, first: string, domain: string): string {
  return `${first}${MASK}@${domain}`;
}

function maskPhoneMatch(match: string): string {
  const digits = match.replace(/\D/g, '');
  if (digits.length < PHONE_MIN_DIGITS) return match;
  return '******' + digits.slice(-4);
}

function maskTokenMatch(match: string, prefix: string, token: string): string {
  if (prefix === '' && !/\d/.test(token)) return match;
  return `${prefix}${token.slice(0, 3)}${MASK}${token.slice(-3)}`;
}

function maskIpMatch(_match: string, firstOctet: string): string {
  return `${firstOctet}.***.***.***`;
}

function maskNameMatch(_match: string, label: string, separator: string, names: string): string {
  const masked = names
    .split(/\s+/)
    .map((part) => `${part.charAt(0)}${MASK}`)
    .join(' ');
  return `${label}${separator}${masked}`;
}

function maskSensitiveField(
  _match: string,
  openQuote: string,
  field: string,
  closeQuote: string,
  separator: string,
  value: string,
): string {
  const quote = value.startsWith('"') || value.startsWith("'") ? value.charAt(0) : '';
  return `${openQuote}${field}${closeQuote}${separator}${quote}${MASK}${quote}`;
}

function applyReplacement(text: string, pattern: RegExp, replacement: Replacer): string {
  if (typeof replacement === 'string') return text.replace(pattern, replacement);
  return text.replace(pattern, (match: string, ...rest: unknown[]) =>
    replacement(match, ...toGroups(rest)),
  );
}

/** Capture groups from a replace callback's rest arguments (unmatched → ''). */
function toGroups(rest: unknown[]): string[] {
  const groups: string[] = [];
  for (const value of rest) {
    if (typeof value === 'number') break;
    groups.push(typeof value === 'string' ? value : '');
  }
  return groups;
}

const DEFAULT_PATTERNS: readonly RedactionPattern[] = [
  { name: 'email', pattern: EMAIL_PATTERN, replacement: maskEmailMatch },
  { name: 'phone', pattern: PHONE_PATTERN, replacement: maskPhoneMatch },
  { name: 'token', pattern: TOKEN_PATTERN, replacement: maskTokenMatch },
  { name: 'ipv4', pattern: IPV4_PATTERN, replacement: maskIpMatch },
  { name: 'name', pattern: NAME_PATTERN, replacement: maskNameMatch },
  { name: 'sensitive-field', pattern: SENSITIVE_FIELD_PATTERN, replacement: maskSensitiveField },
];

// ─── Implementation ──────────────────────────────────────────────────────────

export function createLogRedactor(): LogRedactor {
  const customPatterns: RedactionPattern[] = [];

  function redact(text: string): string {
    let result = text;

    for (const p of DEFAULT_PATTERNS) {
      result = applyReplacement(result, p.pattern, p.replacement);
    }

    for (const p of customPatterns) {
      result = applyReplacement(result, p.pattern, p.replacement);
    }

    return result;
  }

  function redactValue(value: unknown): unknown {
    if (typeof value === 'string') {
      return redact(value);
    }
    if (Array.isArray(value)) {
      return value.map(redactValue);
    }
    if (isPlainRecord(value)) {
      return redactObject(value);
    }
    return value;
  }

  function redactObject(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const key of Object.keys(obj)) {
      result[key] = isSensitiveKey(key) ? MASK : redactValue(obj[key]);
    }
    return result;
  }

  function addPattern(name: string, pattern: RegExp, replacement: Replacer): void {
    customPatterns.push({ name, pattern, replacement });
  }

  return { redact, redactObject, addPattern };
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !(value instanceof Date);
}

const SENSITIVE_KEY_PATTERN = new RegExp(`^(?:${SENSITIVE_FIELD_NAMES.join('|')})$`, 'i');

/** True for metadata keys whose values are never logged (`password`, `apiKey`, …). */
export function isSensitiveKey(key: string): boolean {
  const snake = key.replace(/([a-z0-9])([A-Z])/g, '$1_$2');
  return SENSITIVE_KEY_PATTERN.test(snake);
}
