import { KeyManager, base64Encode, canonicalBytes, sha256, sign, type PrivateKey } from '@tracemark/crypto';
import { assertIntegrityGraph, type IntegrityGraph } from '@tracemark/graph';
import { readJsonFile } from '@tracemark/store';
import { SIGNATURE_ALGORITHM, silentLogger, type Logger } from '@tracemark/types';

import { writeSignatureDocument, type SignatureDocument } from './document';

/**
 * Sign a graph's canonical bytes (not its digest) with Ed25519.
 * Neither the graph nor the key is modified.
 *
 * @throws {InputError} `INPUT_INVALID_GRAPH` when the value is not a well-formed graph.
 * @throws {CryptoError} `CRYPTO_INVALID_KEY` or `CRYPTO_SIGNING_FAILED`.
 *
 * @example
 * ```typescript
 * const doc = await signGraph(graph, await keys.loadPrivateKey('sig.key'));
 * // { algorithm: 'ed25519', graph_sha256: '…', signature_b64: '…' }
 * ```
 */
export async function signGraph(graph: IntegrityGraph, privateKey: PrivateKey): Promise<SignatureDocument> {
  const bytes = canonicalBytes(assertIntegrityGraph(graph));
  const signature = await sign(bytes, privateKey);
  return {
    algorithm: SIGNATURE_ALGORITHM,
    graph_sha256: sha256(bytes),
    signature_b64: base64Encode(signature),
  };
}

export interface SignFileOptions {
  /** Replace an existing signature file. */
  overwrite?: boolean;
  logger?: Logger;
}

/** Read a graph file, sign it with a PEM private key and write the signature document. */
export async function signGraphFile(
  graphPath: string,
  privateKeyPath: string,
  signaturePath: string,
  options?: SignFileOptions,
): Promise<SignatureDocument> {
  const logger = options?.logger ?? silentLogger;
  const graph = assertIntegrityGraph(await readJsonFile(graphPath), graphPath);
  const privateKey = await new KeyManager({ logger }).loadPrivateKey(privateKeyPath);
  const document = await signGraph(graph, privateKey);
  await writeSignatureDocument(signaturePath, document, { overwrite: options?.overwrite ?? false });
  logger.info('signed graph', { graph: graphPath, signature: signaturePath, graph_sha256: document.graph_sha256 });
  return document;
}
