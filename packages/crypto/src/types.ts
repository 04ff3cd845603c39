/** Raw 32-byte Ed25519 private key (the seed). */
export type PrivateKey = Uint8Array;

/** Raw 32-byte Ed25519 public key. */
export type PublicKey = Uint8Array;

/** 64-byte Ed25519 signature. */
export type Signature = Uint8Array;

/** Lowercase hex-encoded SHA-256 digest (64 characters). */
export type HashHex = string;

/** Standard base64 (RFC 4648 section 4, padded). */
export type Base64 = string;

/** Base64url-encoded string (no padding). */
export type Base64Url = string;

/** Source of random bytes; the platform CSPRNG unless a caller injects one. */
export type RandomSource = (length: number) => Uint8Array;

/** A key pair for signing and verification */
export interface KeyPair {
  /** 32-byte private key */
  privateKey: PrivateKey;
  /** 32-byte public key */
  publicKey: PublicKey;
  /** Hex-encoded public key for display/storage */
  publicKeyHex: string;
}

/** Where {@link KeyManager.persist} wrote a key pair. */
export interface PersistedKeyPaths {
  privateKeyPath: string;
  publicKeyPath: string;
}
