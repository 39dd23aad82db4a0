/**
 * Stored representation of an encrypted field.
 *
 * An envelope is `<remote-ciphertext>:<hex-tag>`, or just the remote
 * ciphertext for values written before integrity tags existed. Remote
 * ciphertext itself contains colons (`vault:v1:...`), so the tag is only ever
 * the suffix after the last colon, and only when it is 64 hex characters.
 *
 * @module encryption/envelope
 */

import { MalformedEnvelopeError } from './errors.js';
import type { CiphertextEnvelope } from './types.js';

const TAG_PATTERN = /^[0-9a-fA-F]{64}$/;

export function serializeEnvelope(remoteCiphertext: string, tag?: string): string {
  if (tag === undefined) return remoteCiphertext;
  return `${remoteCiphertext}:${tag}`;
}

/**
 * Split an envelope into remote ciphertext and optional tag.
 *
 * An empty string parses to an empty ciphertext with no tag; callers treat
 * that as "no value" rather than calling the key service.
 *
 * @throws MalformedEnvelopeError when a tag-shaped suffix has nothing before it
 */
export function parseEnvelope(envelope: string): CiphertextEnvelope {
  const lastColon = envelope.lastIndexOf(':');
  if (lastColon === -1) {
    return { remoteCiphertext: envelope };
  }

  const suffix = envelope.slice(lastColon + 1);
  if (!TAG_PATTERN.test(suffix)) {
    return { remoteCiphertext: envelope };
  }

  const remoteCiphertext = envelope.slice(0, lastColon);
  if (remoteCiphertext === '') {
    throw new MalformedEnvelopeError('EMPTY_AFTER_TAG_STRIP');
  }
  return { remoteCiphertext, tag: suffix };
}

