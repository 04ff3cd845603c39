/**
 * The detached signature document: `{ algorithm, graph_sha256, signature_b64 }`.
 */

import { readJsonFile, toPrettyJson, writeFileAtomic, type AtomicWriteOptions } from '@tracemark/store';
import {
  CryptoError,
  InputError,
  SIGNATURE_ALGORITHM,
  TracemarkErrorCode,
  formatSchemaErrors,
  isPlainObject,
  validateSchema,
  type FieldSchema,
} from '@tracemark/types';

export interface SignatureDocument {
  algorithm: typeof SIGNATURE_ALGORITHM;
  /** Lowercase hex SHA-256 of the graph's canonical bytes. */
  graph_sha256: string;
  /** Standard base64 of the 64 signature bytes. */
  signature_b64: string;
}

export const SIGNATURE_DOCUMENT_SCHEMA: FieldSchema = {
  type: 'object',
  required: ['algorithm', 'graph_sha256', 'signature_b64'],
  properties: {
    algorithm: { type: 'string', minLength: 1 },
    graph_sha256: { type: 'string', pattern: /^[0-9a-fA-F]{64}$/ },
    signature_b64: { type: 'string', minLength: 1 },
  },
};

function malformed(source: string, detail: string): InputError {
  return new InputError(TracemarkErrorCode.INPUT_INVALID_SIGNATURE_DOCUMENT, `Invalid ${source}: ${detail}`, {
    hint: 'Signature documents are written by `tracemark sign`.',
  });
}

/**
 * Check a parsed value and narrow it to a {@link SignatureDocument}.
 *
 * The digest is checked for form only (64 hex digits, either case); it is
 * compared byte for byte at verification time.
 *
 * @throws {InputError} `INPUT_INVALID_SIGNATURE_DOCUMENT` for a missing or malformed field.
 * @throws {CryptoError} `CRYPTO_UNSUPPORTED_ALGORITHM` for any algorithm but ed25519.
 */
export function parseSignatureDocument(value: unknown, source = 'signature document'): SignatureDocument {
  const result = validateSchema(value, SIGNATURE_DOCUMENT_SCHEMA);
  if (!result.valid || !isPlainObject(value)) {
    throw malformed(source, formatSchemaErrors(result.errors));
  }
  const { algorithm, graph_sha256, signature_b64 } = value;
  if (typeof algorithm !== 'string' || typeof graph_sha256 !== 'string' || typeof signature_b64 !== 'string') {
    throw malformed(source, 'fields must be strings');
  }
  if (algorithm !== SIGNATURE_ALGORITHM) {
    throw new CryptoError(
      TracemarkErrorCode.CRYPTO_UNSUPPORTED_ALGORITHM,
      `Unsupported signature algorithm "${algorithm}"`,
      { hint: `Only "${SIGNATURE_ALGORITHM}" is supported.`, context: { algorithm } },
    );
  }
  return { algorithm, graph_sha256, signature_b64 };
}

/** Read and check a signature document file. */
export async function readSignatureDocument(filePath: string): Promise<SignatureDocument> {
  return parseSignatureDocument(await readJsonFile(filePath), filePath);
}

/** Write a signature document as pretty JSON. Fails on an existing file unless `overwrite`. */
export async function writeSignatureDocument(
  filePath: string,
  document: SignatureDocument,
  options?: AtomicWriteOptions,
): Promise<void> {
  await writeFileAtomic(filePath, toPrettyJson(document), options);
}
