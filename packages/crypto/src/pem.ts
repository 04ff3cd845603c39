/**
 * PEM codec for Ed25519 keys: PKCS#8 `PRIVATE KEY` and SPKI `PUBLIC KEY`.
 *
 * DER wrapping is delegated to Node's KeyObject through the JWK form
 * (`{ kty: 'OKP', crv: 'Ed25519', d, x }`), so the files interoperate with
 * OpenSSL and other Ed25519 tooling.
 */

import { createPrivateKey, createPublicKey, type JsonWebKey, type KeyObject } from 'crypto';
import { CryptoError, TracemarkErrorCode, describeError } from '@tracemark/types';

import { base64urlDecode, base64urlEncode, ED25519_KEY_LENGTH } from './index';
import type { PrivateKey, PublicKey } from './types';

function parseFailure(kind: string, err: unknown): CryptoError {
  return new CryptoError(
    TracemarkErrorCode.CRYPTO_INVALID_ENCODING,
    `Could not parse ${kind} PEM: ${describeError(err)}`,
    { hint: `Expected a "-----BEGIN ${kind}-----" block.`, cause: err },
  );
}

function rawFromJwk(key: KeyObject, member: 'd' | 'x', kind: string): Uint8Array {
  if (key.asymmetricKeyType !== 'ed25519') {
    throw new CryptoError(
      TracemarkErrorCode.CRYPTO_INVALID_KEY,
      `${kind} is a ${key.asymmetricKeyType ?? 'unknown'} key, not Ed25519`,
      { hint: 'Generate keys with `tracemark keygen`.' },
    );
  }
  const jwk: JsonWebKey = key.export({ format: 'jwk' });
  const encoded = jwk[member];
  const raw = typeof encoded === 'string' ? base64urlDecode(encoded) : new Uint8Array(0);
  if (raw.length !== ED25519_KEY_LENGTH) {
    throw new CryptoError(
      TracemarkErrorCode.CRYPTO_INVALID_KEY,
      `${kind} must be ${ED25519_KEY_LENGTH} bytes, got ${raw.length}`,
    );
  }
  return raw;
}

/** Wrap a 32-byte seed (with its public key) as a PKCS#8 PEM block. */
export function encodePrivateKeyPem(privateKey: PrivateKey, publicKey: PublicKey): string {
  const key = createPrivateKey({
    key: { kty: 'OKP', crv: 'Ed25519', d: base64urlEncode(privateKey), x: base64urlEncode(publicKey) },
    format: 'jwk',
  });
  return key.export({ type: 'pkcs8', format: 'pem' }).toString();
}

/** Wrap a 32-byte public key as an SPKI PEM block. */
export function encodePublicKeyPem(publicKey: PublicKey): string {
  const key = createPublicKey({
    key: { kty: 'OKP', crv: 'Ed25519', x: base64urlEncode(publicKey) },
    format: 'jwk',
  });
  return key.export({ type: 'spki', format: 'pem' }).toString();
}

/**
 * Extract the 32-byte seed from a PKCS#8 PEM private key.
 *
 * @throws {CryptoError} `CRYPTO_INVALID_ENCODING` for unparseable text,
 *   `CRYPTO_INVALID_KEY` for a key of another type.
 */
export function decodePrivateKeyPem(pem: string): PrivateKey {
  let key: KeyObject;
  try {
    key = createPrivateKey({ key: pem, format: 'pem' });
  } catch (err) {
    throw parseFailure('PRIVATE KEY', err);
  }
  return rawFromJwk(key, 'd', 'Private key');
}

/**
 * Extract the 32-byte public key from an SPKI PEM block.
 *
 * @throws {CryptoError} `CRYPTO_INVALID_ENCODING` for unparseable text,
 *   `CRYPTO_INVALID_KEY` for a key of another type.
 */
export function decodePublicKeyPem(pem: string): PublicKey {
  let key: KeyObject;
  try {
    key = createPublicKey({ key: pem, format: 'pem' });
  } catch (err) {
    throw parseFailure('PUBLIC KEY', err);
  }
  return rawFromJwk(key, 'x', 'Public key');
}
