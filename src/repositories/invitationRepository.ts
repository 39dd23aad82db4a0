/**
 * Invitation repository for the invitations table.
 *
 * Email and token are stored as encrypted envelopes with randomized
 * ciphertext. Exact-match lookups go through the sibling `email_hash` and
 * `token_hash` columns, which hold search hashes of the normalized values.
 *
 * @module repositories/invitationRepository
 */

import type { FieldCipher } from '../encryption/fieldEncryptor.js';
import type { SearchHasher } from '../encryption/searchHasher.js';
import type { CallOptions } from '../encryption/types.js';
import type {
  Invitation,
  InvitationRole,
  InvitationStatus,
  NewInvitation,
} from '../types/index.js';
import type { Queryable } from '../utils/db.js';

// ─── Row Mapping ─────────────────────────────────────────────────────────────

interface InvitationRow {
  id: string;
  tenant_id: string;
  email: string;
  role: InvitationRole;
  token: string;
  status: InvitationStatus;
  invited_by: string;
  expires_at: Date;
  accepted_at: Date | null;
  created_at: Date;
}

const INVITATION_COLUMNS =
  'id, tenant_id, email, role, token, status, invited_by, expires_at, accepted_at, created_at';

function mapRowToInvitation(row: InvitationRow, email: string, token: string): Invitation {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    email,
    role: row.role,
    token,
    status: row.status,
    invitedBy: row.invited_by,
    expiresAt: row.expires_at,
    acceptedAt: row.accepted_at,
    createdAt: row.created_at,
  };
}

/** Emails are compared case-insensitively and without surrounding spaces. */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

// ─── Repository ──────────────────────────────────────────────────────────────

export interface InvitationRepositoryDeps {
  db: Queryable;
  cipher: FieldCipher;
  hasher: SearchHasher;
}

export interface InvitationRepository {
  create(invitation: NewInvitation, options?: CallOptions): Promise<Invitation>;
  /** Pending invitation carrying `token`, or null. */
  findByToken(token: string, options?: CallOptions): Promise<Invitation | null>;
  /** Pending invitation for `email` within a tenant, or null. */
  findByEmail(tenantId: string, email: string, options?: CallOptions): Promise<Invitation | null>;
  listByTenant(tenantId: string, options?: CallOptions): Promise<Invitation[]>;
  /** Replace the token of a resent invitation. */
  updateToken(id: string, token: string, expiresAt: Date, options?: CallOptions): Promise<void>;
  markAccepted(id: string): Promise<void>;
}

export function createInvitationRepository(deps: InvitationRepositoryDeps): InvitationRepository {
  const { db, cipher, hasher } = deps;

  async function decryptRows(rows: InvitationRow[], options?: CallOptions): Promise<Invitation[]> {
    const plaintexts = await cipher.decryptBatch(
      rows.flatMap((row) => [row.email, row.token]),
      undefined,
      options,
    );
    return rows.map((row, i) =>
      mapRowToInvitation(row, plaintexts[i * 2] ?? '', plaintexts[i * 2 + 1] ?? ''),
    );
  }

  async function findOne(
    sql: string,
    params: unknown[],
    options?: CallOptions,
  ): Promise<Invitation | null> {
    const result = await db.query<InvitationRow>(sql, params);
    const [invitation] = await decryptRows(result.rows.slice(0, 1), options);
    return invitation ?? null;
  }

  return {
    async create(invitation: NewInvitation, options?: CallOptions): Promise<Invitation> {
      const email = normalizeEmail(invitation.email);
      const [encryptedEmail, encryptedToken] = await cipher.encryptBatch(
        [email, invitation.token],
        undefined,
        options,
      );

      const result = await db.query<InvitationRow>(
        `INSERT INTO invitations (
           tenant_id, email, email_hash, role, token, token_hash, status, invited_by, expires_at
         )
         VALUES ($1, $2, $3, $4, $5, $6, 'pending', $7, $8)
         RETURNING ${INVITATION_COLUMNS}`,
        [
          invitation.tenantId,
          encryptedEmail,
          hasher.hash(email),
          invitation.role,
          encryptedToken,
          hasher.hash(invitation.token),
          invitation.invitedBy,
          invitation.expiresAt.toISOString(),
        ],
      );

      const row = result.rows[0];
      if (!row) {
        throw new Error('Invitation insert returned no row');
      }
      return mapRowToInvitation(row, email, invitation.token);
    },

    async findByToken(token: string, options?: CallOptions): Promise<Invitation | null> {
      if (token === '') return null;
      return findOne(
        `SELECT ${INVITATION_COLUMNS}
         FROM invitations
         WHERE token_hash = $1 AND status = 'pending'`,
        [hasher.hash(token)],
        options,
      );
    },

    async findByEmail(
      tenantId: string,
      email: string,
      options?: CallOptions,
    ): Promise<Invitation | null> {
      const normalized = normalizeEmail(email);
      if (normalized === '') return null;
      return findOne(
        `SELECT ${INVITATION_COLUMNS}
         FROM invitations
         WHERE tenant_id = $1 AND email_hash = $2 AND status = 'pending'`,
        [tenantId, hasher.hash(normalized)],
        options,
      );
    },

    async listByTenant(tenantId: string, options?: CallOptions): Promise<Invitation[]> {
      const result = await db.query<InvitationRow>(
        `SELECT ${INVITATION_COLUMNS}
         FROM invitations
         WHERE tenant_id = $1
         ORDER BY created_at DESC`,
        [tenantId],
      );
      return decryptRows(result.rows, options);
    },

    async updateToken(
      id: string,
      token: string,
      expiresAt: Date,
      options?: CallOptions,
    ): Promise<void> {
      const encryptedToken = await cipher.encrypt(token, options);
      await db.query(
        `UPDATE invitations
         SET token = $1, token_hash = $2, expires_at = $3, updated_at = NOW()
         WHERE id = $4`,
        [encryptedToken, hasher.hash(token), expiresAt.toISOString(), id],
      );
    },

    async markAccepted(id: string): Promise<void> {
      await db.query(
        `UPDATE invitations
         SET status = 'accepted', accepted_at = NOW(), updated_at = NOW()
         WHERE id = $1 AND status = 'pending'`,
        [id],
      );
    },
  };
}
