/**
 * Field encryption module: Vault Transit client, integrity-tagged envelopes,
 * batch field encryption and search hashes.
 *
 * @module encryption
 */

export type {
  CallOptions,
  CiphertextEnvelope,
  EncryptionContext,
  KeyServiceBatchItem,
  KeyServiceBatchResult,
} from './types.js';
export { FIELD_CONTEXTS } from './types.js';
export {
  ConfigurationMissingError,
  ContextMismatchError,
  FieldCryptoError,
  IntegrityViolationError,
  LengthMismatchError,
  MalformedEnvelopeError,
  NoCiphertextReturnedError,
  RemoteServiceError,
  isFieldCryptoError,
} from './errors.js';
export type {
  FieldCryptoErrorCode,
  MalformedEnvelopeReason,
  RemoteServiceErrorOptions,
} from './errors.js';
export {
  IntegrityKeyring,
  TAG_HEX_LENGTH,
  computeTag,
  deriveIntegritySecret,
  verifyTag,
} from './integrityTag.js';
export { parseEnvelope, serializeEnvelope } from './envelope.js';
export type { KeyServiceClient } from './keyServiceClient.js';
export { VaultTransitClient, createNodeVaultWriter } from './vaultTransitClient.js';
export type { VaultTransitConfig, VaultWriter } from './vaultTransitClient.js';
export { InMemoryKeyService } from './inMemoryKeyService.js';
export type {
  InMemoryKeyServiceOptions,
  KeyServiceCall,
  KeyServiceOperation,
} from './inMemoryKeyService.js';
export { FieldEncryptor } from './fieldEncryptor.js';
export type { BestEffortOptions, FieldCipher, FieldEncryptorConfig } from './fieldEncryptor.js';
export { SearchHasher } from './searchHasher.js';
