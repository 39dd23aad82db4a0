/**
 * Customer contact report.
 *
 * Decrypts customer name, phone and email for report rows and returns them
 * masked for display. The report is decorative: when the key service is
 * unavailable the fields degrade to placeholders with a warning instead of
 * failing the request. Integrity and envelope errors still propagate, since
 * they point at tampering or corrupt data rather than an outage.
 *
 * Never reuse this fallback for identity, authorization or amounts.
 *
 * @module services/customerReportService
 */

import { RemoteServiceError } from '../encryption/errors.js';
import type { FieldEncryptor } from '../encryption/fieldEncryptor.js';
import { FIELD_CONTEXTS, type CallOptions } from '../encryption/types.js';
import { createLogger, type Logger } from '../logging/logger.js';
import type {
  CustomerContact,
  EncryptedCustomerContact,
  MaskedCustomerContact,
} from '../types/index.js';
import type { Queryable } from '../utils/db.js';
import { maskEmail, maskName, maskPhone } from '../utils/displayMasker.js';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface CustomerReportService {
  /** Masked contacts for a tenant's most recent customers. */
  listContacts(
    tenantId: string,
    limit?: number,
    options?: CallOptions,
  ): Promise<MaskedCustomerContact[]>;
  /** Masked contact for one customer, or null when it does not exist. */
  getContact(
    tenantId: string,
    customerId: string,
    options?: CallOptions,
  ): Promise<MaskedCustomerContact | null>;
}

export interface CustomerReportDeps {
  db: Queryable;
  encryptor: FieldEncryptor;
  logger?: Logger;
}

interface CustomerContactRow {
  id: string;
  name: string | null;
  phone: string | null;
  email: string | null;
}

const DEFAULT_LIMIT = 50;

/** Field contexts in the order each row's columns are batch-decrypted. */
const CONTACT_CONTEXTS = [
  FIELD_CONTEXTS.CUSTOMER_NAME,
  FIELD_CONTEXTS.CUSTOMER_PHONE,
  FIELD_CONTEXTS.CUSTOMER_EMAIL,
];

function toEncryptedContact(row: CustomerContactRow): EncryptedCustomerContact {
  return {
    customerId: row.id,
    name: row.name ?? '',
    phone: row.phone ?? '',
    email: row.email ?? '',
  };
}

function toMaskedContact(contact: CustomerContact): MaskedCustomerContact {
  return {
    customerId: contact.customerId,
    name: maskName(contact.name),
    phone: maskPhone(contact.phone),
    email: maskEmail(contact.email),
  };
}

// ─── Implementation ──────────────────────────────────────────────────────────

export function createCustomerReportService(deps: CustomerReportDeps): CustomerReportService {
  const { db, encryptor } = deps;
  const logger = (deps.logger ?? createLogger()).child({ operation: 'customer-report' });

  async function decryptForDisplay(
    envelopes: string[],
    contexts: string[],
    options?: CallOptions,
  ): Promise<string[]> {
    try {
      return await encryptor.decryptBatch(envelopes, contexts, options);
    } catch (err) {
      if (!(err instanceof RemoteServiceError)) throw err;
      logger.warn('Customer contact decryption failed; report fields left blank', {
        errorCode: err.code,
        retryable: err.retryable,
        fieldCount: envelopes.length,
      });
      return envelopes.map(() => '');
    }
  }

  return {
    async listContacts(
      tenantId: string,
      limit = DEFAULT_LIMIT,
      options?: CallOptions,
    ): Promise<MaskedCustomerContact[]> {
      const result = await db.query<CustomerContactRow>(
        `SELECT id, name, phone, email
         FROM customers
         WHERE tenant_id = $1
         ORDER BY created_at DESC
         LIMIT $2`,
        [tenantId, limit],
      );
      const contacts = result.rows.map(toEncryptedContact);

      const plaintexts = await decryptForDisplay(
        contacts.flatMap((c) => [c.name, c.phone, c.email]),
        contacts.flatMap(() => CONTACT_CONTEXTS),
        options,
      );

      return contacts.map((contact, i) => {
        const offset = i * CONTACT_CONTEXTS.length;
        const decrypted: CustomerContact = {
          customerId: contact.customerId,
          name: plaintexts[offset] ?? '',
          phone: plaintexts[offset + 1] ?? '',
          email: plaintexts[offset + 2] ?? '',
        };
        return toMaskedContact(decrypted);
      });
    },

    async getContact(
      tenantId: string,
      customerId: string,
      options?: CallOptions,
    ): Promise<MaskedCustomerContact | null> {
      const result = await db.query<CustomerContactRow>(
        `SELECT id, name, phone, email
         FROM customers
         WHERE tenant_id = $1 AND id = $2`,
        [tenantId, customerId],
      );
      const row = result.rows[0];
      if (!row) return null;

      const contact = toEncryptedContact(row);
      const [name, phone, email] = await Promise.all([
        encryptor.decryptBestEffort(contact.name, FIELD_CONTEXTS.CUSTOMER_NAME, {
          ...options,
          field: 'name',
        }),
        encryptor.decryptBestEffort(contact.phone, FIELD_CONTEXTS.CUSTOMER_PHONE, {
          ...options,
          field: 'phone',
        }),
        encryptor.decryptBestEffort(contact.email, FIELD_CONTEXTS.CUSTOMER_EMAIL, {
          ...options,
          field: 'email',
        }),
      ]);

      const decrypted: CustomerContact = { customerId: contact.customerId, name, phone, email };
      return toMaskedContact(decrypted);
    },
  };
}
