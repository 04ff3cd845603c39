/**
 * Canonical JSON (RFC 8785 style) for hashing and signing.
 *
 * Keys are sorted by UTF-16 code units at every depth, no whitespace is
 * emitted, numbers and strings use the ECMAScript JSON forms. Anything JSON
 * cannot represent is rejected rather than coerced.
 */

import { InputError, TracemarkErrorCode, isPlainObject } from '@tracemark/types';

function unsupported(path: string, what: string): InputError {
  return new InputError(
    TracemarkErrorCode.CANONICAL_UNSUPPORTED_VALUE,
    `Cannot canonicalize ${what} at ${path}`,
    {
      hint: 'Only JSON values (objects, arrays, strings, finite numbers, booleans, null) can be hashed or signed.',
      context: { path },
    },
  );
}

function constructorName(value: object): string {
  const proto: unknown = Object.getPrototypeOf(value);
  if (typeof proto === 'object' && proto !== null && 'constructor' in proto && typeof proto.constructor === 'function') {
    return proto.constructor.name;
  }
  return 'object';
}

function serialize(value: unknown, path: string, ancestors: Set<object>): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw unsupported(path, `non-finite number ${String(value)}`);
    }
    return JSON.stringify(value);
  }
  if (typeof value !== 'object') {
    throw unsupported(path, `a value of type ${typeof value}`);
  }
  if (ancestors.has(value)) {
    throw unsupported(path, 'a cyclic reference');
  }

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      const items: string[] = [];
      for (let i = 0; i < value.length; i++) {
        items.push(serialize(value[i], `${path}[${i}]`, ancestors));
      }
      return `[${items.join(',')}]`;
    }

    if (!isPlainObject(value)) {
      throw unsupported(path, `an instance of ${constructorName(value)}`);
    }

    const members: string[] = [];
    for (const key of Object.keys(value).sort()) {
      const member = value[key];
      if (member === undefined) {
        continue;
      }
      members.push(`${JSON.stringify(key)}:${serialize(member, `${path}.${key}`, ancestors)}`);
    }
    return `{${members.join(',')}}`;
  } finally {
    ancestors.delete(value);
  }
}

/**
 * Deterministic JSON serialization.
 *
 * @throws {InputError} `CANONICAL_UNSUPPORTED_VALUE` for non-finite numbers,
 *   bigint, functions, symbols, `undefined` outside an object member,
 *   non-plain objects and cycles.
 *
 * @example
 * ```typescript
 * canonicalizeJson({ z: 1, a: [true, null] }); // '{"a":[true,null],"z":1}'
 * ```
 */
export function canonicalizeJson(value: unknown): string {
  return serialize(value, '$', new Set());
}

/** UTF-8 bytes of {@link canonicalizeJson}. These are the bytes that get hashed and signed. */
export function canonicalBytes(value: unknown): Uint8Array {
  return new TextEncoder().encode(canonicalizeJson(value));
}
