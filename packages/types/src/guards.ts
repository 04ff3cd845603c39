/**
 * Runtime type guards and input parsing for Tracemark artifacts.
 * Use these at system boundaries (files, CLI arguments, deserialization).
 */

import { InputError, TracemarkErrorCode } from './errors';
import type { JsonValue } from './index';

// ─── Type Guards ────────────────────────────────────────────────────────────────

/**
 * Check whether `value` is a non-empty string (after trimming).
 */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Check whether `value` is a plain object (not an array, null, or an object with
 * a non-Object prototype).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Check whether `value` is a JSON value: null, boolean, string, finite
 * number, or an array / plain object of JSON values.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'boolean' || typeof value === 'string') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  return isPlainObject(value) && Object.values(value).every(isJsonValue);
}

// ─── JSON input ─────────────────────────────────────────────────────────────────

/**
 * Recursively reject `__proto__` keys, which `JSON.parse` keeps as own
 * properties but which pollute prototypes once spread or assigned.
 */
function assertNoProtoKeys(obj: unknown, source: string): void {
  if (typeof obj !== 'object' || obj === null) return;

  if (Array.isArray(obj)) {
    for (const item of obj) {
      assertNoProtoKeys(item, source);
    }
    return;
  }

  for (const [key, value] of Object.entries(obj)) {
    if (key === '__proto__') {
      throw new InputError(
        TracemarkErrorCode.INPUT_INVALID_JSON,
        `${source} contains a "__proto__" key`,
        { context: { source } },
      );
    }
    assertNoProtoKeys(value, source);
  }
}

/**
 * Parse JSON text, naming the artifact in any error.
 *
 * @param text   - The JSON text.
 * @param source - Human-readable name of the artifact (file path, "line 3").
 * @throws {InputError} When the text is not JSON or carries a `__proto__` key.
 *
 * @example
 * ```typescript
 * const graph = parseJson(await fs.readFile(p, 'utf-8'), p);
 * ```
 */
export function parseJson(text: string, source: string): unknown {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new InputError(
      TracemarkErrorCode.INPUT_INVALID_JSON,
      `${source} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      { context: { source }, cause: err },
    );
  }
  assertNoProtoKeys(parsed, source);
  return parsed;
}
