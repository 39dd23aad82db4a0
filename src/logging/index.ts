/**
 * Logging Module
 *
 * Structured JSON logging with context enrichment and PII redaction.
 */

export {
  type LogLevel,
  type LogMetadata,
  type LogContext,
  type ErrorInfo,
  type LogEntry,
  type Logger,
  type LogOutput,
  type LoggerOptions,
  createLogger,
} from './logger.js';

export {
  type LogRedactor,
  type RedactionPattern,
  type Replacer,
  SENSITIVE_FIELD_NAMES,
  createLogRedactor,
  isSensitiveKey,
} from './logRedactor.js';
