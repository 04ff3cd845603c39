/**
 * @tracemark/types - Shared types, errors and logging.
 *
 * Provides the error classes and codes, the structured logger, runtime
 * guards, JSON value types and schema validation used across every package.
 *
 * @packageDocumentation
 */

// ─── JSON values ────────────────────────────────────────────────────────────────

/** A JSON primitive. */
export type JsonPrimitive = string | number | boolean | null;

/** Any value that JSON can represent. */
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

// ─── Protocol constants ─────────────────────────────────────────────────────────

/** Current Tracemark version string. */
export const TRACEMARK_VERSION = '0.1.0';

/** The only signature scheme Tracemark signs and verifies with. */
export const SIGNATURE_ALGORITHM = 'ed25519';

/** Digest used for content hashes and graph hashes. */
export const HASH_ALGORITHM = 'sha256';

// ─── Errors ─────────────────────────────────────────────────────────────────────

export {
  TracemarkError,
  TracemarkErrorCode,
  InputError,
  CryptoError,
  PersistenceError,
  errorCategory,
  formatError,
  describeError,
} from './errors';
export type { TracemarkErrorOptions, ErrorCategory } from './errors';

// ─── Runtime type guards ────────────────────────────────────────────────────────

export {
  isNonEmptyString,
  isPlainObject,
  isJsonValue,
  parseJson,
} from './guards';

// ─── Structural validation ──────────────────────────────────────────────────────

export { validateSchema, formatSchemaErrors } from './schema';
export type { FieldSchema, SchemaValidationError, SchemaValidationResult } from './schema';

// ─── Structured logging ─────────────────────────────────────────────────────────

export {
  Logger,
  LogLevel,
  silentLogger,
  isLogLevelName,
  logLevelFromName,
} from './logger';
export type { LogEntry, LogOutput, LoggerOptions, LogLevelName } from './logger';
