/**
 * Session repository for the sessions table.
 *
 * The session identifier and client IP address are stored as encrypted
 * envelopes. The identifier is encrypted under a fixed context, which makes
 * its envelope deterministic: lookups encrypt the incoming identifier and
 * compare envelopes in SQL, so no search hash column is needed.
 *
 * Decrypt failures propagate. Session lookup is an identity check and is
 * never served with placeholder values.
 *
 * @module repositories/sessionRepository
 */

import type { FieldCipher } from '../encryption/fieldEncryptor.js';
import { FIELD_CONTEXTS, type CallOptions } from '../encryption/types.js';
import type { NewSession, Session } from '../types/index.js';
import type { Queryable } from '../utils/db.js';

// ─── Row Mapping ─────────────────────────────────────────────────────────────

/** Raw row shape returned by PostgreSQL for the sessions table. */
interface SessionRow {
  id: string;
  session_id: string;
  tenant_id: string;
  user_id: string;
  ip_address: string | null;
  user_agent: string | null;
  expires_at: Date;
  created_at: Date;
  terminated_at: Date | null;
}

const SESSION_COLUMNS =
  'id, session_id, tenant_id, user_id, ip_address, user_agent, expires_at, created_at, terminated_at';

/** Encrypted columns of one row, in the order they are batch-decrypted. */
const ENCRYPTED_FIELDS = [FIELD_CONTEXTS.SESSION_ID, FIELD_CONTEXTS.SESSION_IP_ADDRESS];

function mapRowToSession(row: SessionRow, sessionId: string, ipAddress: string): Session {
  return {
    id: row.id,
    sessionId,
    tenantId: row.tenant_id,
    userId: row.user_id,
    ipAddress: ipAddress === '' ? null : ipAddress,
    userAgent: row.user_agent,
    expiresAt: row.expires_at,
    createdAt: row.created_at,
    terminatedAt: row.terminated_at,
  };
}

// ─── Repository ──────────────────────────────────────────────────────────────

export interface SessionRepositoryDeps {
  db: Queryable;
  cipher: FieldCipher;
}

export interface SessionRepository {
  create(session: NewSession, options?: CallOptions): Promise<Session>;
  findBySessionId(sessionId: string, options?: CallOptions): Promise<Session | null>;
  findActiveByUserId(userId: string, options?: CallOptions): Promise<Session[]>;
  /** Returns false when no active session matched. */
  terminate(sessionId: string, options?: CallOptions): Promise<boolean>;
  /** Hard-delete sessions that expired more than `retentionDays` ago. */
  deleteExpired(retentionDays: number): Promise<number>;
}

export function createSessionRepository(deps: SessionRepositoryDeps): SessionRepository {
  const { db, cipher } = deps;

  function lookupKey(sessionId: string, options?: CallOptions): Promise<string> {
    return cipher.encryptWithContext(sessionId, FIELD_CONTEXTS.SESSION_ID, options);
  }

  async function decryptRows(rows: SessionRow[], options?: CallOptions): Promise<Session[]> {
    const envelopes = rows.flatMap((row) => [row.session_id, row.ip_address ?? '']);
    const contexts = rows.flatMap(() => ENCRYPTED_FIELDS);
    const plaintexts = await cipher.decryptBatch(envelopes, contexts, options);

    return rows.map((row, i) =>
      mapRowToSession(
        row,
        plaintexts[i * ENCRYPTED_FIELDS.length] ?? '',
        plaintexts[i * ENCRYPTED_FIELDS.length + 1] ?? '',
      ),
    );
  }

  return {
    async create(session: NewSession, options?: CallOptions): Promise<Session> {
      const ipAddress = session.ipAddress ?? '';
      const [encryptedSessionId, encryptedIpAddress] = await cipher.encryptBatch(
        [session.sessionId, ipAddress],
        ENCRYPTED_FIELDS,
        options,
      );

      const result = await db.query<SessionRow>(
        `INSERT INTO sessions (session_id, tenant_id, user_id, ip_address, user_agent, expires_at)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING ${SESSION_COLUMNS}`,
        [
          encryptedSessionId,
          session.tenantId,
          session.userId,
          encryptedIpAddress || null,
          session.userAgent ?? null,
          session.expiresAt.toISOString(),
        ],
      );

      const row = result.rows[0];
      if (!row) {
        throw new Error('Session insert returned no row');
      }
      return mapRowToSession(row, session.sessionId, ipAddress);
    },

    async findBySessionId(sessionId: string, options?: CallOptions): Promise<Session | null> {
      if (sessionId === '') return null;

      const result = await db.query<SessionRow>(
        `SELECT ${SESSION_COLUMNS}
         FROM sessions
         WHERE session_id = $1 AND terminated_at IS NULL AND expires_at > NOW()`,
        [await lookupKey(sessionId, options)],
      );

      const [session] = await decryptRows(result.rows.slice(0, 1), options);
      return session ?? null;
    },

    async findActiveByUserId(userId: string, options?: CallOptions): Promise<Session[]> {
      const result = await db.query<SessionRow>(
        `SELECT ${SESSION_COLUMNS}
         FROM sessions
         WHERE user_id = $1 AND terminated_at IS NULL AND expires_at > NOW()
         ORDER BY created_at DESC`,
        [userId],
      );

      return decryptRows(result.rows, options);
    },

    async terminate(sessionId: string, options?: CallOptions): Promise<boolean> {
      if (sessionId === '') return false;

      const result = await db.query(
        `UPDATE sessions
         SET terminated_at = NOW()
         WHERE session_id = $1 AND terminated_at IS NULL`,
        [await lookupKey(sessionId, options)],
      );
      return (result.rowCount ?? 0) > 0;
    },

    async deleteExpired(retentionDays: number): Promise<number> {
      const result = await db.query(
        `DELETE FROM sessions
         WHERE expires_at < NOW() - make_interval(days => $1)`,
        [retentionDays],
      );
      return result.rowCount ?? 0;
    },
  };
}
