/**
 * @tracemark/sig - Sign and verify integrity graphs with Ed25519.
 *
 * @packageDocumentation
 */

export {
  parseSignatureDocument,
  readSignatureDocument,
  writeSignatureDocument,
  SIGNATURE_DOCUMENT_SCHEMA,
} from './document';
export type { SignatureDocument } from './document';

export { signGraph, signGraphFile } from './signer';
export type { SignFileOptions } from './signer';

export { verifyGraph, verifyGraphFiles } from './verifier';
export type { GraphVerificationResult, VerificationFailure, VerifyFileOptions } from './verifier';
