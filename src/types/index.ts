/**
 * Shared domain and API types.
 *
 * Domain objects hold plaintext; their encrypted forms exist only as
 * database rows inside the repositories.
 *
 * @module types
 */

// ─── Sessions ────────────────────────────────────────────────────────────────

export interface Session {
  id: string;
  /** Opaque session identifier issued to the client. Stored encrypted. */
  sessionId: string;
  tenantId: string;
  userId: string;
  /** Client IP address, or null when unknown. Stored encrypted. */
  ipAddress: string | null;
  userAgent: string | null;
  expiresAt: Date;
  createdAt: Date;
  terminatedAt: Date | null;
}

export interface NewSession {
  sessionId: string;
  tenantId: string;
  userId: string;
  ipAddress?: string | null;
  userAgent?: string | null;
  expiresAt: Date;
}

// ─── Invitations ─────────────────────────────────────────────────────────────

export type InvitationStatus = 'pending' | 'accepted' | 'expired' | 'revoked';

export type InvitationRole = 'owner' | 'manager' | 'cashier';

export interface Invitation {
  id: string;
  tenantId: string;
  /** Lower-cased, trimmed email. Stored encrypted with a search hash. */
  email: string;
  role: InvitationRole;
  /** Acceptance token. Stored encrypted with a search hash. */
  token: string;
  status: InvitationStatus;
  invitedBy: string;
  expiresAt: Date;
  acceptedAt: Date | null;
  createdAt: Date;
}

export interface NewInvitation {
  tenantId: string;
  email: string;
  role: InvitationRole;
  token: string;
  invitedBy: string;
  expiresAt: Date;
}

// ─── Customer Report ─────────────────────────────────────────────────────────

/** Encrypted customer contact columns as read from the database. */
export interface EncryptedCustomerContact {
  customerId: string;
  name: string;
  phone: string;
  email: string;
}

/** Decrypted customer contact. Held in memory only; never logged or returned. */
export interface CustomerContact {
  customerId: string;
  name: string;
  phone: string;
  email: string;
}

/** Display-only customer contact row. Every PII field is masked. */
export interface MaskedCustomerContact {
  customerId: string;
  name: string;
  phone: string;
  email: string;
}

// ─── API Response Types ──────────────────────────────────────────────────────

export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    fields?: Record<string, string[]>;
  };
  requestId: string;
}
