import { describe, it, expect } from 'vitest';
import { RemoteServiceError } from './errors.js';
import { InMemoryKeyService } from './inMemoryKeyService.js';
import { TEST_KEY_MATERIAL, createTestKeyService } from './testHelpers.js';

describe('InMemoryKeyService', () => {
  it('should produce Vault-shaped ciphertext', async () => {
    const service = createTestKeyService();
    expect(await service.encrypt('hello', '')).toMatch(/^vault:v1:[A-Za-z0-9+/]+=*$/);
  });

  it('should round-trip with and without context', async () => {
    const service = createTestKeyService();
    expect(await service.decrypt(await service.encrypt('hello', ''), '')).toBe('hello');
    expect(await service.decrypt(await service.encrypt('hello', 'customer:name'), 'customer:name')).toBe(
      'hello',
    );
  });

  it('should be randomized without context', async () => {
    const service = createTestKeyService();
    expect(await service.encrypt('hello', '')).not.toBe(await service.encrypt('hello', ''));
  });

  it('should be convergent under a context', async () => {
    const service = createTestKeyService();
    const a = await service.encrypt('sess-1', 'session:session_id');
    const b = await service.encrypt('sess-1', 'session:session_id');
    const other = await service.encrypt('sess-1', 'session:ip_address');
    expect(a).toBe(b);
    expect(other).not.toBe(a);
  });

  it('should give equal ciphertext for equal key material', async () => {
    const first = new InMemoryKeyService({ keyMaterial: TEST_KEY_MATERIAL });
    const second = new InMemoryKeyService({ keyMaterial: TEST_KEY_MATERIAL });
    expect(await first.encrypt('x', 'ctx')).toBe(await second.encrypt('x', 'ctx'));
  });

  it('should reject decryption under the wrong context', async () => {
    const service = createTestKeyService();
    const ciphertext = await service.encrypt('hello', 'customer:name');

    await expect(service.decrypt(ciphertext, 'customer:email')).rejects.toMatchObject({
      code: 'REMOTE_SERVICE_ERROR',
      retryable: false,
      status: 400,
    });
  });

  it('should reject ciphertext without the version prefix', async () => {
    const service = createTestKeyService();
    await expect(service.decrypt('not-vault-data', '')).rejects.toThrow(
      'invalid ciphertext: no version prefix',
    );
  });

  it('should settle batch items independently', async () => {
    const service = createTestKeyService();
    const good = await service.encrypt('ok', '');

    const results = await service.decryptBatch([
      { value: good },
      { value: 'vault:v1:AAAA' },
    ]);

    expect(results).toEqual([{ value: 'ok' }, { error: 'invalid ciphertext: too short' }]);
  });

  it('should record calls with their values and contexts', async () => {
    const service = createTestKeyService();
    await service.encryptBatch([{ value: 'a', context: 'c1' }, { value: 'b' }]);

    expect(service.calls).toEqual([
      { operation: 'encryptBatch', values: ['a', 'b'], contexts: ['c1', ''] },
    ]);
  });

  it('should fail every call while disabled and recover when enabled', async () => {
    const service = createTestKeyService();
    service.disable();

    const error = await service.encrypt('a', '').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(RemoteServiceError);
    expect(error).toMatchObject({ message: 'Key service unavailable', retryable: true, status: 503 });

    service.enable();
    expect(await service.decrypt(await service.encrypt('a', ''), '')).toBe('a');
  });

  it('should reject key material of the wrong size', () => {
    expect(() => new InMemoryKeyService({ keyMaterial: Buffer.alloc(16) })).toThrow(
      'InMemoryKeyService key material must be 32 bytes',
    );
  });
});
