import { describe, it, expect, vi } from 'vitest';
import { createFieldProtection } from './fieldProtection.js';
import { loadFieldProtectionConfig } from './fieldProtectionConfig.js';
import { computeTag, deriveIntegritySecret } from './encryption/integrityTag.js';
import { InMemoryKeyService } from './encryption/inMemoryKeyService.js';
import { pgResult } from './encryption/testHelpers.js';
import type { VaultWriter } from './encryption/vaultTransitClient.js';
import type { LogEntry } from './logging/logger.js';

const config = loadFieldProtectionConfig({
  VAULT_ADDR: 'http://vault.test:8200',
  VAULT_TOKEN: 'test-token',
  VAULT_TRANSIT_KEY: 'pos-pii-v2',
  VAULT_PREVIOUS_TRANSIT_KEYS: 'pos-pii-v1',
  SEARCH_HASH_SECRET: 'test-search-secret',
  LOG_LEVEL: 'debug',
});

/** Vault stand-in whose ciphertext is the base64 plaintext behind a prefix. */
function createEchoVault(): VaultWriter & { paths: string[] } {
  const paths: string[] = [];
  return {
    paths,
    write(path: string, data: Record<string, unknown>): Promise<unknown> {
      paths.push(path);
      const { plaintext, ciphertext } = data;
      if (typeof plaintext === 'string') {
        return Promise.resolve({ data: { ciphertext: `vault:v1:${plaintext}` } });
      }
      if (typeof ciphertext === 'string') {
        return Promise.resolve({ data: { plaintext: ciphertext.slice('vault:v1:'.length) } });
      }
      return Promise.reject(
        Object.assign(new Error('unsupported request'), {
          response: { statusCode: 400, body: { errors: ['unsupported request'] } },
        }),
      );
    },
  };
}

describe('createFieldProtection', () => {
  it('should wire the encryptor to the Vault client', async () => {
    const vault = createEchoVault();
    const entries: LogEntry[] = [];
    const fp = createFieldProtection(config, {
      vault,
      db: { query: vi.fn() },
      logOutput: (entry) => entries.push(entry),
    });

    const envelope = await fp.encryptor.encrypt('hello');

    const remote = `vault:v1:${Buffer.from('hello').toString('base64')}`;
    expect(envelope).toBe(`${remote}:${computeTag(deriveIntegritySecret('pos-pii-v2'), remote)}`);
    expect(vault.paths[0]).toBe('transit/encrypt/pos-pii-v2');
    expect(await fp.encryptor.decrypt(envelope)).toBe('hello');
    expect(fp.keyService.keyName).toBe('pos-pii-v2');
    expect(entries[0]?.message).toBe('Field protection initialised');
    expect(entries[0]?.service).toBe('field-protection');

    await fp.close();
  });

  it('should accept tags written under a previous key name', async () => {
    const vault = createEchoVault();
    const fp = createFieldProtection(config, {
      vault,
      db: { query: vi.fn() },
      logOutput: () => undefined,
    });

    const remote = `vault:v1:${Buffer.from('older value').toString('base64')}`;
    const legacyTagged = `${remote}:${computeTag(deriveIntegritySecret('pos-pii-v1'), remote)}`;

    expect(await fp.encryptor.decrypt(legacyTagged)).toBe('older value');
  });

  it('should use an injected key service and database', async () => {
    const query = vi.fn().mockResolvedValue(pgResult([]));
    const keyService = new InMemoryKeyService({ keyName: 'pos-pii-v2' });
    const fp = createFieldProtection(config, {
      keyService,
      db: { query },
      logOutput: () => undefined,
    });

    expect(await fp.invitations.findByToken('missing-token')).toBeNull();
    expect(query).toHaveBeenCalledWith(expect.stringContaining('token_hash = $1'), [
      fp.searchHasher.hash('missing-token'),
    ]);
    expect(fp.keyService).toBe(keyService);
  });

  it('should redact PII in log output', () => {
    const entries: LogEntry[] = [];
    const fp = createFieldProtection(config, {
      keyService: new InMemoryKeyService(),
      db: { query: vi.fn() },
      logOutput: (entry) => entries.push(entry),
    });

    fp.logger.info('Invitation sent to cashier@example.com');

    expect(entries.at(-1)?.message).toBe('Invitation sent to c***@example.com');
  });
});
