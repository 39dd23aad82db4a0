/**
 * Field Protection
 *
 * Composition root for the PII protection layer. Builds the logger, key
 * service client, field encryptor, search hasher and the repositories and
 * services that depend on them exactly once, so they can be injected
 * wherever encrypted fields are read or written.
 *
 * @module fieldProtection
 */

import type pg from 'pg';
import { FieldEncryptor } from './encryption/fieldEncryptor.js';
import { IntegrityKeyring } from './encryption/integrityTag.js';
import type { KeyServiceClient } from './encryption/keyServiceClient.js';
import { SearchHasher } from './encryption/searchHasher.js';
import { VaultTransitClient, type VaultWriter } from './encryption/vaultTransitClient.js';
import type { FieldProtectionConfig } from './fieldProtectionConfig.js';
import { createLogRedactor, type LogRedactor } from './logging/logRedactor.js';
import { createLogger, type Logger, type LogOutput } from './logging/logger.js';
import {
  createInvitationRepository,
  type InvitationRepository,
} from './repositories/invitationRepository.js';
import { createSessionRepository, type SessionRepository } from './repositories/sessionRepository.js';
import {
  createCustomerReportService,
  type CustomerReportService,
} from './services/customerReportService.js';
import { createPool, toQueryable, type Queryable } from './utils/db.js';

export interface FieldProtectionOverrides {
  /** Replaces the Vault client entirely (e.g. an in-memory key service). */
  keyService?: KeyServiceClient;
  /** Vault client used by the Transit key service. Defaults to node-vault. */
  vault?: VaultWriter;
  /** Database access. Defaults to a pool built from DB_* variables. */
  db?: Queryable;
  logOutput?: LogOutput;
}

export interface FieldProtection {
  logger: Logger;
  redactor: LogRedactor;
  keyService: KeyServiceClient;
  encryptor: FieldEncryptor;
  searchHasher: SearchHasher;
  sessions: SessionRepository;
  invitations: InvitationRepository;
  customerReport: CustomerReportService;
  /** Release resources owned by this instance (the default pool). */
  close(): Promise<void>;
}

export function createFieldProtection(
  config: FieldProtectionConfig,
  overrides: FieldProtectionOverrides = {},
): FieldProtection {
  const redactor = createLogRedactor();
  const logger = createLogger({
    service: config.serviceName,
    level: config.logLevel,
    output: overrides.logOutput,
    redactor,
  });

  const keyService =
    overrides.keyService ??
    new VaultTransitClient(
      {
        address: config.vault.address,
        token: config.vault.token,
        keyName: config.vault.transitKey,
        mount: config.vault.mount,
        timeoutMs: config.vault.timeoutMs,
      },
      overrides.vault,
    );

  const encryptor = new FieldEncryptor({
    keyService,
    integrity: IntegrityKeyring.fromKeyNames(
      config.vault.transitKey,
      config.vault.previousTransitKeys,
    ),
    logger,
  });
  const searchHasher = new SearchHasher(config.searchHashSecret);

  let pool: pg.Pool | null = null;
  let db = overrides.db;
  if (!db) {
    pool = createPool();
    db = toQueryable(pool);
  }

  logger.info('Field protection initialised', {
    keyName: keyService.keyName,
    integritySecrets: config.vault.previousTransitKeys.length + 1,
  });

  return {
    logger,
    redactor,
    keyService,
    encryptor,
    searchHasher,
    sessions: createSessionRepository({ db, cipher: encryptor }),
    invitations: createInvitationRepository({ db, cipher: encryptor, hasher: searchHasher }),
    customerReport: createCustomerReportService({ db, encryptor, logger }),
    async close(): Promise<void> {
      if (pool) {
        await pool.end();
        pool = null;
      }
    },
  };
}
