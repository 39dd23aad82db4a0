import { describe, it, expect } from 'vitest';
import { parseEnvelope, serializeEnvelope } from './envelope.js';
import { MalformedEnvelopeError } from './errors.js';

const REMOTE = 'vault:v1:QUJDREVGR0hJSktMTU5PUA==';
const TAG = 'ab'.repeat(32);

describe('serializeEnvelope', () => {
  it('appends the tag after a colon', () => {
    expect(serializeEnvelope(REMOTE, TAG)).toBe(`${REMOTE}:${TAG}`);
  });

  it('returns bare ciphertext when no tag is given', () => {
    expect(serializeEnvelope(REMOTE)).toBe(REMOTE);
  });
});

describe('parseEnvelope', () => {
  it('splits a tagged envelope at the last colon', () => {
    expect(parseEnvelope(`${REMOTE}:${TAG}`)).toEqual({ remoteCiphertext: REMOTE, tag: TAG });
  });

  it('accepts upper-case hex as tag-shaped', () => {
    const upper = TAG.toUpperCase();
    expect(parseEnvelope(`${REMOTE}:${upper}`)).toEqual({ remoteCiphertext: REMOTE, tag: upper });
  });

  it('treats legacy ciphertext as untagged', () => {
    expect(parseEnvelope(REMOTE)).toEqual({ remoteCiphertext: REMOTE });
  });

  it('treats a value without colons as untagged', () => {
    expect(parseEnvelope('plainvalue')).toEqual({ remoteCiphertext: 'plainvalue' });
  });

  it('ignores suffixes that are not exactly 64 hex characters', () => {
    const short = `${REMOTE}:${TAG.slice(2)}`;
    const long = `${REMOTE}:${TAG}ab`;
    const nonHex = `${REMOTE}:${'g'.repeat(64)}`;
    expect(parseEnvelope(short)).toEqual({ remoteCiphertext: short });
    expect(parseEnvelope(long)).toEqual({ remoteCiphertext: long });
    expect(parseEnvelope(nonHex)).toEqual({ remoteCiphertext: nonHex });
  });

  it('parses the empty string as an empty untagged value', () => {
    expect(parseEnvelope('')).toEqual({ remoteCiphertext: '' });
  });

  it('rejects a tag with nothing before it', () => {
    expect(() => parseEnvelope(`:${TAG}`)).toThrow(MalformedEnvelopeError);
    try {
      parseEnvelope(`:${TAG}`);
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedEnvelopeError);
      expect((err as MalformedEnvelopeError).reason).toBe('EMPTY_AFTER_TAG_STRIP');
      expect((err as MalformedEnvelopeError).index).toBeUndefined();
    }
  });

  it('round-trips serialized envelopes', () => {
    expect(parseEnvelope(serializeEnvelope(REMOTE, TAG))).toEqual({
      remoteCiphertext: REMOTE,
      tag: TAG,
    });
  });
});
