/**
 * Test helpers for the field encryption module.
 *
 * Provides pre-configured in-memory key services, encryptors with captured
 * log output, and pg-shaped query results for repository tests.
 */

import type { QueryResult, QueryResultRow } from 'pg';
import { FieldEncryptor } from './fieldEncryptor.js';
import { InMemoryKeyService, type InMemoryKeyServiceOptions } from './inMemoryKeyService.js';
import { IntegrityKeyring } from './integrityTag.js';
import { createLogger, type LogEntry, type Logger } from '../logging/logger.js';

/** Fixed key material so ciphertext is reproducible within a test run. */
export const TEST_KEY_MATERIAL = Buffer.alloc(32, 7);

export const TEST_KEY_NAME = 'test-transit-key';

export interface CapturedLogger {
  logger: Logger;
  entries: LogEntry[];
}

/** A logger that records entries instead of writing them to stdout. */
export function createCapturedLogger(): CapturedLogger {
  const entries: LogEntry[] = [];
  const logger = createLogger({
    service: 'field-protection-test',
    level: 'debug',
    debugSampleRate: 1,
    output: (entry) => entries.push(entry),
  });
  return { logger, entries };
}

export function createTestKeyService(
  options: InMemoryKeyServiceOptions = {},
): InMemoryKeyService {
  return new InMemoryKeyService({
    keyName: TEST_KEY_NAME,
    keyMaterial: TEST_KEY_MATERIAL,
    ...options,
  });
}

export interface TestEncryptorContext {
  encryptor: FieldEncryptor;
  keyService: InMemoryKeyService;
  entries: LogEntry[];
}

export interface TestEncryptorOptions {
  keyService?: InMemoryKeyService;
  integrity?: IntegrityKeyring;
}

/**
 * Create a FieldEncryptor over an in-memory key service. Use this in
 * beforeEach or at the start of each property test.
 */
export function createTestEncryptor(options: TestEncryptorOptions = {}): TestEncryptorContext {
  const keyService = options.keyService ?? createTestKeyService();
  const { logger, entries } = createCapturedLogger();
  const encryptor = new FieldEncryptor({
    keyService,
    integrity: options.integrity,
    logger,
  });
  return { encryptor, keyService, entries };
}

/** Wrap rows in a pg-style QueryResult shape. */
export function pgResult<T extends QueryResultRow>(rows: T[], rowCount = rows.length): QueryResult<T> {
  return { rows, rowCount, command: '', oid: 0, fields: [] };
}

/** Replace one hex character of an envelope's trailing tag. */
export function flipTagCharacter(envelope: string, position = 0): string {
  const tagStart = envelope.length - 64;
  const index = tagStart + position;
  const current = envelope.charAt(index);
  const replacement = current === '0' ? '1' : '0';
  return envelope.slice(0, index) + replacement + envelope.slice(index + 1);
}
