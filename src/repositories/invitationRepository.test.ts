/**
 * Unit tests for the InvitationRepository module.
 *
 * Queries go to an in-process Queryable stub. Tests verify that email and
 * token are stored encrypted, that lookups use search hashes of normalized
 * values, and that rows are decrypted back to plaintext.
 *
 * @module repositories/invitationRepository.test
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { FieldEncryptor } from '../encryption/fieldEncryptor.js';
import { SearchHasher } from '../encryption/searchHasher.js';
import { createTestEncryptor, pgResult } from '../encryption/testHelpers.js';
import {
  createInvitationRepository,
  normalizeEmail,
  type InvitationRepository,
} from './invitationRepository.js';

// ─── Helpers ─────────────────────────────────────────────────────────────────

const mockQuery = vi.fn();
const hasher = new SearchHasher('test-search-secret');

const EXPIRES_AT = new Date('2026-08-01T00:00:00Z');
const CREATED_AT = new Date('2026-07-25T09:30:00Z');

function fakeInvitationRow(overrides: Record<string, unknown> = {}) {
  return {
    id: 'inv-0001',
    tenant_id: 'tenant-1',
    email: '',
    role: 'cashier',
    token: '',
    status: 'pending',
    invited_by: 'user-owner',
    expires_at: EXPIRES_AT,
    accepted_at: null,
    created_at: CREATED_AT,
    ...overrides,
  };
}

let encryptor: FieldEncryptor;
let repo: InvitationRepository;

beforeEach(() => {
  mockQuery.mockReset();
  ({ encryptor } = createTestEncryptor());
  repo = createInvitationRepository({ db: { query: mockQuery }, cipher: encryptor, hasher });
});

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('invitationRepository', () => {
  describe('normalizeEmail', () => {
    it('should trim and lower-case', () => {
      expect(normalizeEmail('  New.Cashier@Example.COM ')).toBe('new.cashier@example.com');
    });
  });

  describe('create', () => {
    it('should store encrypted email and token with search hashes', async () => {
      mockQuery.mockImplementationOnce((_sql: string, params: unknown[]) =>
        Promise.resolve(pgResult([fakeInvitationRow({ email: params[1], token: params[4] })])),
      );

      const invitation = await repo.create({
        tenantId: 'tenant-1',
        email: ' Cashier@Example.com',
        role: 'cashier',
        token: 'invite-token-0001',
        invitedBy: 'user-owner',
        expiresAt: EXPIRES_AT,
      });

      const [sql, params] = mockQuery.mock.calls[0] as [string, unknown[]];
      expect(sql).toContain('INSERT INTO invitations');
      expect(params[0]).toBe('tenant-1');
      expect(params[2]).toBe(hasher.hash('cashier@example.com'));
      expect(params[3]).toBe('cashier');
      expect(params[5]).toBe(hasher.hash('invite-token-0001'));
      expect(params[6]).toBe('user-owner');
      expect(params[7]).toBe('2026-08-01T00:00:00.000Z');

      expect(params[1]).not.toContain('cashier@example.com');
      expect(params[4]).not.toContain('invite-token-0001');
      expect(await encryptor.decrypt(String(params[1]))).toBe('cashier@example.com');
      expect(await encryptor.decrypt(String(params[4]))).toBe('invite-token-0001');

      expect(invitation).toEqual({
        id: 'inv-0001',
        tenantId: 'tenant-1',
        email: 'cashier@example.com',
        role: 'cashier',
        token: 'invite-token-0001',
        status: 'pending',
        invitedBy: 'user-owner',
        expiresAt: EXPIRES_AT,
        acceptedAt: null,
        createdAt: CREATED_AT,
      });
    });
  });

  describe('findByToken', () => {
    it('should look up by token hash and decrypt the row', async () => {
      mockQuery.mockResolvedValueOnce(
        pgResult([
          fakeInvitationRow({
            email: await encryptor.encrypt('cashier@example.com'),
            token: await encryptor.encrypt('invite-token-0002'),
          }),
        ]),
      );

      const invitation = await repo.findByToken('invite-token-0002');

      const [sql, params] = mockQuery.mock.calls[0] as [string, unknown[]];
      expect(sql).toContain("WHERE token_hash = $1 AND status = 'pending'");
      expect(params).toEqual([hasher.hash('invite-token-0002')]);
      expect(invitation?.email).toBe('cashier@example.com');
      expect(invitation?.token).toBe('invite-token-0002');
    });

    it('should return null when nothing matches', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([]));

      expect(await repo.findByToken('unknown')).toBeNull();
    });

    it('should return null for an empty token without querying', async () => {
      expect(await repo.findByToken('')).toBeNull();
      expect(mockQuery).not.toHaveBeenCalled();
    });
  });

  describe('findByEmail', () => {
    it('should hash the normalized email within the tenant', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([]));

      await repo.findByEmail('tenant-7', '  MANAGER@example.com');

      const [sql, params] = mockQuery.mock.calls[0] as [string, unknown[]];
      expect(sql).toContain('WHERE tenant_id = $1 AND email_hash = $2');
      expect(params).toEqual(['tenant-7', hasher.hash('manager@example.com')]);
    });

    it('should return null for a blank email without querying', async () => {
      expect(await repo.findByEmail('tenant-7', '   ')).toBeNull();
      expect(mockQuery).not.toHaveBeenCalled();
    });
  });

  describe('listByTenant', () => {
    it('should decrypt every row in order', async () => {
      mockQuery.mockResolvedValueOnce(
        pgResult([
          fakeInvitationRow({
            id: 'inv-1',
            email: await encryptor.encrypt('first@example.com'),
            token: await encryptor.encrypt('token-one-1'),
          }),
          fakeInvitationRow({
            id: 'inv-2',
            email: await encryptor.encrypt('second@example.com'),
            token: await encryptor.encrypt('token-two-2'),
          }),
        ]),
      );

      const invitations = await repo.listByTenant('tenant-1');

      expect(invitations.map((inv) => [inv.id, inv.email, inv.token])).toEqual([
        ['inv-1', 'first@example.com', 'token-one-1'],
        ['inv-2', 'second@example.com', 'token-two-2'],
      ]);
    });
  });

  describe('updateToken', () => {
    it('should store the new encrypted token and its hash', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([], 1));

      await repo.updateToken('inv-1', 'fresh-token-9', EXPIRES_AT);

      const [sql, params] = mockQuery.mock.calls[0] as [string, unknown[]];
      expect(sql).toContain('UPDATE invitations');
      expect(await encryptor.decrypt(String(params[0]))).toBe('fresh-token-9');
      expect(params.slice(1)).toEqual([
        hasher.hash('fresh-token-9'),
        '2026-08-01T00:00:00.000Z',
        'inv-1',
      ]);
    });
  });

  describe('markAccepted', () => {
    it('should only accept pending invitations', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([], 1));

      await repo.markAccepted('inv-1');

      const [sql, params] = mockQuery.mock.calls[0] as [string, unknown[]];
      expect(sql).toContain("WHERE id = $1 AND status = 'pending'");
      expect(params).toEqual(['inv-1']);
    });
  });
});
