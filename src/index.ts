/**
 * PII field protection for the POS backend.
 *
 * @module pos-field-protection
 */

// ─── Domain Types ───
export type {
  CustomerContact,
  EncryptedCustomerContact,
  ErrorResponse,
  Invitation,
  InvitationRole,
  InvitationStatus,
  MaskedCustomerContact,
  NewInvitation,
  NewSession,
  Session,
} from './types/index.js';

// ─── Encryption Module ───
export * from './encryption/index.js';

// ─── Logging Module ───
export * from './logging/index.js';

// ─── Display Masking ───
export { maskEmail, maskName, maskPhone } from './utils/displayMasker.js';

// ─── Repositories & Services ───
export {
  createSessionRepository,
  type SessionRepository,
} from './repositories/sessionRepository.js';
export {
  createInvitationRepository,
  normalizeEmail,
  type InvitationRepository,
} from './repositories/invitationRepository.js';
export {
  createCustomerReportService,
  type CustomerReportService,
} from './services/customerReportService.js';

// ─── Composition ───
export {
  loadFieldProtectionConfig,
  type ConfigEnv,
  type FieldProtectionConfig,
} from './fieldProtectionConfig.js';
export {
  createFieldProtection,
  type FieldProtection,
  type FieldProtectionOverrides,
} from './fieldProtection.js';
export { createApp, type AppDependencies } from './app.js';
export { createPool, getDbConfig, toQueryable, type DbConfig, type Queryable } from './utils/db.js';
