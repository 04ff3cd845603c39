/**
 * Graph signature verification.
 *
 * Integrity failures are results, not exceptions: only malformed inputs
 * (document, key, algorithm) throw.
 */

import {
  ED25519_SIGNATURE_LENGTH,
  KeyManager,
  assertPublicKey,
  base64Decode,
  canonicalBytes,
  sha256,
  verify,
  type PublicKey,
} from '@tracemark/crypto';
import { readJsonFile } from '@tracemark/store';
import { silentLogger, type Logger } from '@tracemark/types';

import { parseSignatureDocument, readSignatureDocument } from './document';

export type VerificationFailure = 'graph_hash_mismatch' | 'signature_invalid';

export type GraphVerificationResult =
  | { valid: true; reason: string }
  | { valid: false; failure: VerificationFailure; reason: string };

const REASONS: Record<VerificationFailure, string> = {
  graph_hash_mismatch: 'Graph hash mismatch.',
  signature_invalid: 'Signature verification failed.',
};

function verified(): GraphVerificationResult {
  return { valid: true, reason: 'Signature verified.' };
}

function failed(failure: VerificationFailure): GraphVerificationResult {
  return { valid: false, failure, reason: REASONS[failure] };
}

async function checkSignature(signatureB64: string, bytes: Uint8Array, publicKey: PublicKey): Promise<boolean> {
  let signature: Uint8Array;
  try {
    signature = base64Decode(signatureB64);
  } catch {
    return false;
  }
  if (signature.length !== ED25519_SIGNATURE_LENGTH) {
    return false;
  }
  return verify(bytes, signature, publicKey);
}

/**
 * Verify that `graph` is exactly the graph the document was signed over.
 *
 * The graph may be any JSON value: a structurally altered graph fails the
 * hash comparison, which runs before the signature is looked at.
 *
 * @param document - Parsed signature document (checked here).
 * @throws {InputError} For a malformed document or a graph JSON cannot represent.
 * @throws {CryptoError} For an unsupported algorithm or a wrong-size public key.
 *
 * @example
 * ```typescript
 * const result = await verifyGraph(doc, graph, publicKey);
 * if (!result.valid) console.error(result.failure, result.reason);
 * ```
 */
export async function verifyGraph(
  document: unknown,
  graph: unknown,
  publicKey: PublicKey,
): Promise<GraphVerificationResult> {
  const doc = parseSignatureDocument(document);
  assertPublicKey(publicKey);

  const bytes = canonicalBytes(graph);
  if (sha256(bytes) !== doc.graph_sha256) {
    return failed('graph_hash_mismatch');
  }
  return (await checkSignature(doc.signature_b64, bytes, publicKey)) ? verified() : failed('signature_invalid');
}

export interface VerifyFileOptions {
  logger?: Logger;
}

/** File form of {@link verifyGraph}: signature document, graph JSON and SPKI PEM public key. */
export async function verifyGraphFiles(
  signaturePath: string,
  graphPath: string,
  publicKeyPath: string,
  options?: VerifyFileOptions,
): Promise<GraphVerificationResult> {
  const logger = options?.logger ?? silentLogger;
  const document = await readSignatureDocument(signaturePath);
  const graph = await readJsonFile(graphPath);
  const publicKey = await new KeyManager({ logger }).loadPublicKey(publicKeyPath);
  const result = await verifyGraph(document, graph, publicKey);
  if (result.valid) {
    logger.info('signature verified', { graph: graphPath });
  } else {
    logger.warn('verification failed', { graph: graphPath, failure: result.failure });
  }
  return result;
}
