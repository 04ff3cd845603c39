/**
 * Ed25519 key lifecycle on disk: generation, persistence as PEM, loading.
 *
 * @packageDocumentation
 */

import { randomBytes } from '@noble/hashes/utils';
import { readTextFile, writeFilesAtomic } from '@tracemark/store';
import { silentLogger, type Logger } from '@tracemark/types';

import { generateKeyPair } from './index';
import { decodePrivateKeyPem, decodePublicKeyPem, encodePrivateKeyPem, encodePublicKeyPem } from './pem';
import type { KeyPair, PersistedKeyPaths, PrivateKey, PublicKey, RandomSource } from './types';

/** Options accepted by the {@link KeyManager} constructor. */
export interface KeyManagerOptions {
  /** Byte source for new keys. Defaults to the platform CSPRNG. */
  random?: RandomSource;
  logger?: Logger;
}

/** Options for {@link KeyManager.persist}. */
export interface PersistOptions {
  /** Replace existing key files. Defaults to false. */
  overwrite?: boolean;
}

/** File mode of persisted private keys. */
const PRIVATE_KEY_MODE = 0o600;

/**
 * Generates, persists and loads Ed25519 key pairs.
 *
 * ```ts
 * const keys = new KeyManager();
 * const kp = await keys.generate();
 * await keys.persist(kp, 'sig.key', 'sig.pub');
 * const priv = await keys.loadPrivateKey('sig.key');
 * ```
 */
export class KeyManager {
  private readonly random: RandomSource;
  private readonly logger: Logger;

  constructor(options?: KeyManagerOptions) {
    this.random = options?.random ?? randomBytes;
    this.logger = options?.logger ?? silentLogger;
  }

  /** Generate a fresh key pair. */
  async generate(): Promise<KeyPair> {
    const keyPair = await generateKeyPair(this.random);
    this.logger.debug('generated key pair', { publicKey: keyPair.publicKeyHex });
    return keyPair;
  }

  /**
   * Write the private key (PKCS#8, mode 0600) and public key (SPKI).
   *
   * Without `overwrite`, an existing file at either path fails before
   * anything is written. If the second file cannot be written the first
   * is removed again, or gets its earlier contents back when it was replaced.
   *
   * @throws {PersistenceError} `PERSIST_FILE_EXISTS` or `PERSIST_WRITE_FAILED`.
   */
  async persist(
    keyPair: KeyPair,
    privatePath: string,
    publicPath: string,
    options?: PersistOptions,
  ): Promise<PersistedKeyPaths> {
    const [privateKeyPath, publicKeyPath] = await writeFilesAtomic(
      [
        { path: privatePath, data: encodePrivateKeyPem(keyPair.privateKey, keyPair.publicKey), mode: PRIVATE_KEY_MODE },
        { path: publicPath, data: encodePublicKeyPem(keyPair.publicKey) },
      ],
      { overwrite: options?.overwrite ?? false },
    );
    const persisted = {
      privateKeyPath: privateKeyPath ?? privatePath,
      publicKeyPath: publicKeyPath ?? publicPath,
    };
    this.logger.info('persisted key pair', { ...persisted, publicKey: keyPair.publicKeyHex });
    return persisted;
  }

  /**
   * Load a PKCS#8 PEM private key.
   *
   * @throws {PersistenceError} When the file cannot be read.
   * @throws {CryptoError} When the file is not an Ed25519 private key.
   */
  async loadPrivateKey(filePath: string): Promise<PrivateKey> {
    return decodePrivateKeyPem(await readTextFile(filePath));
  }

  /**
   * Load an SPKI PEM public key.
   *
   * @throws {PersistenceError} When the file cannot be read.
   * @throws {CryptoError} When the file is not an Ed25519 public key.
   */
  async loadPublicKey(filePath: string): Promise<PublicKey> {
    return decodePublicKeyPem(await readTextFile(filePath));
  }
}
