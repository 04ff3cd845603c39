/**
 * @tracemark/crypto - Canonical JSON, SHA-256 and Ed25519 primitives.
 *
 * @packageDocumentation
 */

import * as ed from '@noble/ed25519';
import { sha256 as nobleSha256 } from '@noble/hashes/sha256';
import { randomBytes } from '@noble/hashes/utils';
import { CryptoError, TracemarkErrorCode, describeError } from '@tracemark/types';

import type { Base64, Base64Url, HashHex, KeyPair, PrivateKey, PublicKey, RandomSource, Signature } from './types';
import { canonicalBytes } from './canonical';

export type {
  KeyPair,
  PrivateKey,
  PublicKey,
  Signature,
  HashHex,
  Base64,
  Base64Url,
  RandomSource,
  PersistedKeyPaths,
} from './types';

export { canonicalizeJson, canonicalBytes } from './canonical';

/** Size in bytes of Ed25519 private seeds and public keys. */
export const ED25519_KEY_LENGTH = 32;

/** Size in bytes of an Ed25519 signature. */
export const ED25519_SIGNATURE_LENGTH = 64;

function invalidKey(what: string, key: Uint8Array): CryptoError {
  return new CryptoError(
    TracemarkErrorCode.CRYPTO_INVALID_KEY,
    `${what} must be ${ED25519_KEY_LENGTH} bytes, got ${key.length}`,
    { hint: 'Ed25519 keys are 32 raw bytes. Check that the key file is not truncated.' },
  );
}

// ─── Keys ───────────────────────────────────────────────────────────────────────

/**
 * Generate a new Ed25519 key pair from the platform CSPRNG.
 *
 * @param random - Byte source; defaults to `crypto.getRandomValues` via @noble/hashes.
 * @throws {CryptoError} `CRYPTO_RANDOM_UNAVAILABLE` when no CSPRNG is present or it
 *   returns the wrong number of bytes. A weaker source is never substituted.
 *
 * @example
 * ```typescript
 * const kp = await generateKeyPair();
 * console.log(kp.publicKeyHex); // 64-char hex string
 * ```
 */
export async function generateKeyPair(random: RandomSource = randomBytes): Promise<KeyPair> {
  let privateKey: Uint8Array;
  try {
    privateKey = random(ED25519_KEY_LENGTH);
  } catch (err) {
    throw new CryptoError(
      TracemarkErrorCode.CRYPTO_RANDOM_UNAVAILABLE,
      `Secure random source unavailable: ${describeError(err)}`,
      { hint: 'Run on a platform that provides crypto.getRandomValues().', cause: err },
    );
  }
  if (privateKey.length !== ED25519_KEY_LENGTH) {
    throw new CryptoError(
      TracemarkErrorCode.CRYPTO_RANDOM_UNAVAILABLE,
      `Expected ${ED25519_KEY_LENGTH} random bytes from CSPRNG, got ${privateKey.length}`,
      { hint: 'This indicates a platform CSPRNG issue.' },
    );
  }
  return keyPairFromPrivateKey(privateKey);
}

/**
 * Reconstruct a KeyPair from an existing private key. The input is copied.
 *
 * @throws {CryptoError} `CRYPTO_INVALID_KEY` when the key is not 32 bytes.
 */
export async function keyPairFromPrivateKey(privateKey: PrivateKey): Promise<KeyPair> {
  if (privateKey.length !== ED25519_KEY_LENGTH) {
    throw invalidKey('Private key', privateKey);
  }
  const publicKey = await ed.getPublicKeyAsync(privateKey);
  return {
    privateKey: new Uint8Array(privateKey),
    publicKey,
    publicKeyHex: toHex(publicKey),
  };
}

// ─── Signatures ─────────────────────────────────────────────────────────────────

/**
 * Sign arbitrary bytes with an Ed25519 private key.
 *
 * @throws {CryptoError} `CRYPTO_INVALID_KEY` for a wrong-size key,
 *   `CRYPTO_SIGNING_FAILED` if the primitive fails.
 */
export async function sign(message: Uint8Array, privateKey: PrivateKey): Promise<Signature> {
  if (privateKey.length !== ED25519_KEY_LENGTH) {
    throw invalidKey('Private key', privateKey);
  }
  try {
    return await ed.signAsync(message, privateKey);
  } catch (err) {
    throw new CryptoError(
      TracemarkErrorCode.CRYPTO_SIGNING_FAILED,
      `Ed25519 signing operation failed: ${describeError(err)}`,
      { cause: err },
    );
  }
}

/**
 * Verify an Ed25519 signature against a message and public key.
 *
 * Never throws: a malformed key, a truncated signature or a backend
 * exception all yield `false`.
 */
export async function verify(message: Uint8Array, signature: Signature, publicKey: PublicKey): Promise<boolean> {
  try {
    return await ed.verifyAsync(signature, message, publicKey);
  } catch {
    return false;
  }
}

/** Throw unless `publicKey` has the Ed25519 public key size. */
export function assertPublicKey(publicKey: PublicKey): void {
  if (publicKey.length !== ED25519_KEY_LENGTH) {
    throw invalidKey('Public key', publicKey);
  }
}

// ─── Hashing ────────────────────────────────────────────────────────────────────

/**
 * SHA-256 of arbitrary bytes as lowercase hex.
 *
 * @example
 * ```typescript
 * sha256(new TextEncoder().encode('hello'));
 * // '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 * ```
 */
export function sha256(data: Uint8Array): HashHex {
  return toHex(nobleSha256(data));
}

/** SHA-256 of a UTF-8 string. */
export function sha256String(data: string): HashHex {
  return sha256(new TextEncoder().encode(data));
}

/**
 * SHA-256 of a value's canonical JSON bytes. Structurally equal values hash
 * the same regardless of key insertion order.
 */
export function sha256Object(value: unknown): HashHex {
  return sha256(canonicalBytes(value));
}

// ─── Encodings ──────────────────────────────────────────────────────────────────

function invalidEncoding(message: string, hint: string): CryptoError {
  return new CryptoError(TracemarkErrorCode.CRYPTO_INVALID_ENCODING, message, { hint });
}

/**
 * Encode a byte array to a lowercase hex string.
 *
 * @example
 * ```typescript
 * toHex(new Uint8Array([255, 0])); // 'ff00'
 * ```
 */
export function toHex(data: Uint8Array): string {
  let hex = '';
  for (let i = 0; i < data.length; i++) {
    hex += data[i]!.toString(16).padStart(2, '0');
  }
  return hex;
}

/**
 * Decode a hex string to a byte array.
 *
 * @throws {CryptoError} `CRYPTO_INVALID_ENCODING` for odd length or non-hex characters.
 */
export function fromHex(hex: string): Uint8Array {
  if (hex.length % 2 !== 0) {
    throw invalidEncoding(
      `Invalid hex string: odd length (${hex.length})`,
      'Hex strings must have even length. Each byte is represented by two hex characters.',
    );
  }
  if (hex.length > 0 && !/^[0-9a-fA-F]+$/.test(hex)) {
    throw invalidEncoding(
      'Invalid hex string: contains non-hexadecimal characters',
      'Hex strings must only contain characters 0-9 and a-f (case-insensitive).',
    );
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < hex.length; i += 2) {
    bytes[i / 2] = parseInt(hex.substring(i, i + 2), 16);
  }
  return bytes;
}

function bytesToBinary(data: Uint8Array): string {
  let binary = '';
  for (let i = 0; i < data.length; i++) {
    binary += String.fromCharCode(data[i]!);
  }
  return binary;
}

function binaryToBytes(binary: string): Uint8Array {
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}

/**
 * Standard base64 with padding, as used in signature documents.
 *
 * @example
 * ```typescript
 * base64Encode(new Uint8Array([72, 105])); // 'SGk='
 * ```
 */
export function base64Encode(data: Uint8Array): Base64 {
  return btoa(bytesToBinary(data));
}

/**
 * Strict standard base64 decode: padded, no whitespace, no URL-safe alphabet.
 *
 * @throws {CryptoError} `CRYPTO_INVALID_ENCODING` on any malformed input.
 */
export function base64Decode(encoded: Base64): Uint8Array {
  if (encoded.length % 4 !== 0 || !/^[A-Za-z0-9+/]*={0,2}$/.test(encoded)) {
    throw invalidEncoding(
      'Invalid base64 string',
      'Expected standard base64 (A-Z, a-z, 0-9, +, /) with "=" padding.',
    );
  }
  return binaryToBytes(atob(encoded));
}

/** Base64url encode (RFC 4648 section 5, no padding). */
export function base64urlEncode(data: Uint8Array): Base64Url {
  return base64Encode(data).replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '');
}

/**
 * Decode a base64url string, with or without padding.
 *
 * @throws {CryptoError} `CRYPTO_INVALID_ENCODING` on characters outside the URL-safe alphabet.
 */
export function base64urlDecode(encoded: Base64Url): Uint8Array {
  if (!/^[A-Za-z0-9_-]*={0,2}$/.test(encoded) || encoded.replace(/=+$/, '').length % 4 === 1) {
    throw invalidEncoding(
      'Invalid base64url string',
      'Ensure the input is base64url-encoded (characters A-Z, a-z, 0-9, -, _).',
    );
  }
  const base64 = encoded.replace(/=+$/, '').replace(/-/g, '+').replace(/_/g, '/');
  return base64Decode(base64 + '='.repeat((4 - (base64.length % 4)) % 4));
}

// ─── Misc ───────────────────────────────────────────────────────────────────────

/** Current UTC time in ISO 8601 form (e.g. `"2026-01-15T12:00:00.000Z"`). */
export function timestamp(): string {
  return new Date().toISOString();
}

// ─── Key files ──────────────────────────────────────────────────────────────────

export {
  encodePrivateKeyPem,
  encodePublicKeyPem,
  decodePrivateKeyPem,
  decodePublicKeyPem,
} from './pem';

export { KeyManager } from './key-manager';
export type { KeyManagerOptions, PersistOptions } from './key-manager';
