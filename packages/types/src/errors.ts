/**
 * Error code system for Tracemark.
 *
 * Every thrown error carries a stable code (TM_Exxx) naming one failure
 * mode. Codes are grouped by category so callers can tell an operator
 * problem (corrupt key, unwritable path) apart from bad input.
 *
 * Integrity failures (hash or signature mismatch) are NOT errors: the
 * verifier reports them as values.
 *
 * @packageDocumentation
 */

// ─── Error codes ────────────────────────────────────────────────────────────────

/** All Tracemark error codes. */
export enum TracemarkErrorCode {
  // Input (1xx)
  /** A file or string did not contain valid JSON. */
  INPUT_INVALID_JSON = 'TM_E100',
  /** A transcript line is not a well-formed event. */
  INPUT_INVALID_TRANSCRIPT = 'TM_E101',
  /** A graph does not have the nodes/edges shape or breaks the chain invariants. */
  INPUT_INVALID_GRAPH = 'TM_E102',
  /** A signature document is missing fields or has malformed values. */
  INPUT_INVALID_SIGNATURE_DOCUMENT = 'TM_E103',
  /** The configuration file has an invalid shape. */
  INPUT_INVALID_CONFIG = 'TM_E104',
  /** An event has no timestamp and the builder requires one. */
  INPUT_MISSING_TIMESTAMP = 'TM_E105',
  /** A required argument was empty or missing. */
  INPUT_INVALID_ARGUMENT = 'TM_E106',

  // Canonicalization (2xx)
  /** A value cannot be represented in canonical JSON. */
  CANONICAL_UNSUPPORTED_VALUE = 'TM_E200',

  // Crypto backend (3xx)
  /** A key is malformed, has the wrong size, or is not an Ed25519 key. */
  CRYPTO_INVALID_KEY = 'TM_E300',
  /** The signature document names an algorithm other than ed25519. */
  CRYPTO_UNSUPPORTED_ALGORITHM = 'TM_E301',
  /** The platform CSPRNG is missing or returned the wrong number of bytes. */
  CRYPTO_RANDOM_UNAVAILABLE = 'TM_E302',
  /** The signing primitive failed. */
  CRYPTO_SIGNING_FAILED = 'TM_E303',
  /** A hex, base64 or PEM encoding is malformed. */
  CRYPTO_INVALID_ENCODING = 'TM_E304',

  // Persistence (4xx)
  /** The destination exists and overwrite was not requested. */
  PERSIST_FILE_EXISTS = 'TM_E400',
  /** Writing a file failed (unwritable path, disk error). */
  PERSIST_WRITE_FAILED = 'TM_E401',
  /** Reading a file failed (missing file, permissions). */
  PERSIST_READ_FAILED = 'TM_E402',
}

/** Broad category of an error code. */
export type ErrorCategory = 'input' | 'canonical' | 'crypto' | 'persistence';

/**
 * Map an error code to its category.
 *
 * @example
 * ```typescript
 * errorCategory(TracemarkErrorCode.CRYPTO_INVALID_KEY); // 'crypto'
 * ```
 */
export function errorCategory(code: TracemarkErrorCode): ErrorCategory {
  switch (code.charAt(4)) {
    case '1':
      return 'input';
    case '2':
      return 'canonical';
    case '3':
      return 'crypto';
    default:
      return 'persistence';
  }
}

// ─── Error classes ──────────────────────────────────────────────────────────────

/** Options for constructing a TracemarkError. */
export interface TracemarkErrorOptions {
  /** Additional structured context for diagnostics and logging. */
  context?: Record<string, unknown>;
  /** A human-readable hint suggesting how to resolve the error. */
  hint?: string;
  /** The underlying cause of this error, for error chaining. */
  cause?: unknown;
}

/**
 * Base error class for all Tracemark errors.
 *
 * @example
 * ```typescript
 * throw new TracemarkError(
 *   TracemarkErrorCode.INPUT_INVALID_GRAPH,
 *   'Graph is missing the "edges" array',
 *   { hint: 'Graphs are objects of the form {"nodes": [...], "edges": [...]}' }
 * );
 * ```
 */
export class TracemarkError extends Error {
  readonly code: TracemarkErrorCode;
  readonly context?: Record<string, unknown>;
  readonly hint?: string;

  constructor(code: TracemarkErrorCode, message: string, options?: TracemarkErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'TracemarkError';
    this.code = code;
    this.context = options?.context;
    this.hint = options?.hint;
  }

  /** The category this error's code belongs to. */
  get category(): ErrorCategory {
    return errorCategory(this.code);
  }

  /**
   * Return a structured JSON representation suitable for logging.
   */
  toJSON(): { code: string; message: string; hint?: string; context?: Record<string, unknown> } {
    const result: { code: string; message: string; hint?: string; context?: Record<string, unknown> } = {
      code: this.code,
      message: this.message,
    };
    if (this.hint !== undefined) {
      result.hint = this.hint;
    }
    if (this.context !== undefined) {
      result.context = this.context;
    }
    return result;
  }
}

/** Malformed transcripts, graphs, signature documents, config or arguments. */
export class InputError extends TracemarkError {
  constructor(code: TracemarkErrorCode, message: string, options?: TracemarkErrorOptions) {
    super(code, message, options);
    this.name = 'InputError';
  }
}

/** Corrupt keys, unsupported algorithms and CSPRNG failures. */
export class CryptoError extends TracemarkError {
  constructor(code: TracemarkErrorCode, message: string, options?: TracemarkErrorOptions) {
    super(code, message, options);
    this.name = 'CryptoError';
  }
}

/** Unwritable paths, pre-existing files and unreadable files. */
export class PersistenceError extends TracemarkError {
  constructor(code: TracemarkErrorCode, message: string, options?: TracemarkErrorOptions) {
    super(code, message, options);
    this.name = 'PersistenceError';
  }
}

// ─── Utility functions ──────────────────────────────────────────────────────────

/**
 * Format an error for display.
 *
 * @example
 * ```typescript
 * formatError(new InputError(TracemarkErrorCode.INPUT_INVALID_JSON, 'graph.json is not JSON', { hint: 'Check the file' }));
 * // [TM_E100] graph.json is not JSON
 * // Hint: Check the file
 * ```
 */
export function formatError(error: TracemarkError): string {
  const lines: string[] = [];
  lines.push(`[${error.code}] ${error.message}`);
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  return lines.join('\n');
}

/** Render any thrown value's message. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
