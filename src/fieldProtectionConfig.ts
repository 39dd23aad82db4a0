/**
 * Field Protection Configuration
 *
 * Reads key service, search hash and logging settings from environment
 * variables. Required values are checked together so a misconfigured
 * deployment reports every missing variable in one startup failure.
 */

import { ConfigurationMissingError } from './encryption/errors.js';
import type { LogLevel } from './logging/logger.js';

export interface FieldProtectionConfig {
  vault: {
    address: string;
    token: string;
    transitKey: string;
    mount: string;
    timeoutMs: number;
    /** Earlier key names whose integrity tags are still accepted. */
    previousTransitKeys: string[];
  };
  searchHashSecret: string;
  logLevel: LogLevel;
  serviceName: string;
}

export type ConfigEnv = Record<string, string | undefined>;

const REQUIRED_VARIABLES = [
  'VAULT_ADDR',
  'VAULT_TOKEN',
  'VAULT_TRANSIT_KEY',
  'SEARCH_HASH_SECRET',
] as const;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function loadFieldProtectionConfig(env: ConfigEnv = process.env): FieldProtectionConfig {
  const missing = REQUIRED_VARIABLES.filter((name) => (env[name] ?? '').trim() === '');
  if (missing.length > 0) {
    throw new ConfigurationMissingError([...missing]);
  }

  const timeoutMs = parseInt(env['VAULT_TIMEOUT_MS'] ?? '10000', 10);
  const logLevel = (env['LOG_LEVEL'] ?? 'info').toLowerCase();

  return {
    vault: {
      address: env['VAULT_ADDR'] ?? '',
      token: env['VAULT_TOKEN'] ?? '',
      transitKey: env['VAULT_TRANSIT_KEY'] ?? '',
      mount: env['VAULT_TRANSIT_MOUNT'] ?? 'transit',
      timeoutMs: isNaN(timeoutMs) || timeoutMs <= 0 ? 10000 : timeoutMs,
      previousTransitKeys: (env['VAULT_PREVIOUS_TRANSIT_KEYS'] ?? '')
        .split(',')
        .map((key) => key.trim())
        .filter((key) => key !== ''),
    },
    searchHashSecret: env['SEARCH_HASH_SECRET'] ?? '',
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
    serviceName: env['SERVICE_NAME'] ?? 'field-protection',
  };
}
