import { describe, it, expect } from 'vitest';
import { createLogRedactor, isSensitiveKey } from './logRedactor.js';

describe('LogRedactor', () => {
  const redactor = createLogRedactor();

  describe('redact', () => {
    it('should keep the first character and domain of an email', () => {
      expect(redactor.redact('Contact user@example.com')).toBe('Contact u***@example.com');
    });

    it('should keep the last four digits of a phone number', () => {
      expect(redactor.redact('Call +628123456789 now')).toBe('Call ******6789 now');
    });

    it('should leave short digit runs alone', () => {
      expect(redactor.redact('order 1234 paid')).toBe('order 1234 paid');
    });

    it('should keep the first octet of an IPv4 address', () => {
      expect(redactor.redact('from 192.168.1.100')).toBe('from 192.***.***.***');
    });

    it('should mask an IPv4 address next to a phone number and a token', () => {
      expect(redactor.redact('ip 192.168.1.100 1234567 token abcdef1234567890XYZ')).toBe(
        'ip 192.***.***.*** ******4567 token abc***XYZ',
      );
    });

    it('should mask a phone number at the end of a sentence', () => {
      expect(redactor.redact('Call 08123456789.')).toBe('Call ******6789.');
    });

    it('should leave UUIDs intact', () => {
      expect(redactor.redact('request 550e8400-e29b-41d4-a716-446655440000 failed')).toBe(
        'request 550e8400-e29b-41d4-a716-446655440000 failed',
      );
      expect(redactor.redact('f47ac10b-58cc-4372-a567-0e02b2c3d479')).toBe(
        'f47ac10b-58cc-4372-a567-0e02b2c3d479',
      );
      expect(redactor.redact('12345678-1234-4372-a567-0e02b2c3d479')).toBe(
        '12345678-1234-4372-a567-0e02b2c3d479',
      );
    });

    it('should shorten tokens to their ends', () => {
      expect(redactor.redact('token_abc123def456ghi')).toBe('token_abc***ghi');
    });

    it('should leave long plain words alone', () => {
      expect(redactor.redact('verification succeeded')).toBe('verification succeeded');
    });

    it('should mask labelled names', () => {
      expect(redactor.redact('customer_name: John Doe')).toBe('customer_name: J*** D***');
    });

    it('should replace sensitive field values entirely', () => {
      expect(redactor.redact('password=hunter2')).toBe('password=***');
      expect(redactor.redact('password: s3cr3tValue123')).toBe('password: ***');
    });

    it('should be idempotent', () => {
      const inputs = [
        'Contact user@example.com',
        'Call +628123456789 now',
        'from 192.168.1.100',
        'token_abc123def456ghi',
        'customer_name: John Doe',
        'password=hunter2',
      ];
      for (const input of inputs) {
        const once = redactor.redact(input);
        expect(redactor.redact(once)).toBe(once);
      }
    });
  });

  describe('redactObject', () => {
    it('should redact string values and replace sensitive keys', () => {
      const result = redactor.redactObject({
        password: 'hunter2',
        note: 'Contact user@example.com',
        nested: { apiKey: 'abc', ip: 'ip 10.0.0.1' },
        count: 3,
        list: ['Call +628123456789 now'],
      });

      expect(result).toEqual({
        password: '***',
        note: 'Contact u***@example.com',
        nested: { apiKey: '***', ip: 'ip 10.***.***.***' },
        count: 3,
        list: ['Call ******6789 now'],
      });
    });

    it('should keep request and correlation ids', () => {
      const metadata = {
        requestId: '550e8400-e29b-41d4-a716-446655440000',
        correlationId: 'f47ac10b-58cc-4372-a567-0e02b2c3d479',
      };

      expect(redactor.redactObject(metadata)).toEqual(metadata);
    });

    it('should not mutate its input', () => {
      const input = { note: 'Contact user@example.com' };
      redactor.redactObject(input);
      expect(input.note).toBe('Contact user@example.com');
    });
  });

  describe('addPattern', () => {
    it('should apply custom patterns after the defaults', () => {
      const custom = createLogRedactor();
      custom.addPattern('member-id', /MBR-\d{4}/g, 'MBR-####');

      expect(custom.redact('member MBR-1234 joined')).toBe('member MBR-#### joined');
      expect(redactor.redact('member MBR-1234 joined')).toBe('member MBR-1234 joined');
    });

    it('should accept replacement functions', () => {
      const custom = createLogRedactor();
      custom.addPattern('sku', /SKU-(\w+)/g, (_match, code) => `SKU-${code.length}`);

      expect(custom.redact('item SKU-ABCD')).toBe('item SKU-4');
    });
  });

  describe('isSensitiveKey', () => {
    it('should match snake and camel case names', () => {
      expect(isSensitiveKey('password')).toBe(true);
      expect(isSensitiveKey('apiKey')).toBe(true);
      expect(isSensitiveKey('api_key')).toBe(true);
      expect(isSensitiveKey('sessionId')).toBe(true);
      expect(isSensitiveKey('Authorization')).toBe(true);
    });

    it('should not match ordinary keys', () => {
      expect(isSensitiveKey('field')).toBe(false);
      expect(isSensitiveKey('context')).toBe(false);
      expect(isSensitiveKey('errorCode')).toBe(false);
      expect(isSensitiveKey('tokenCount')).toBe(false);
    });
  });
});
