/**
 * Tamper and hardening tests for graph signatures.
 *
 * Known-answer Ed25519 vectors, signature substitution between graphs,
 * bit flips, malformed encodings and hostile key material.
 */

import { describe, it, expect } from 'vitest';
import { generateKeyPairSync } from 'crypto';

import {
  base64Decode,
  base64Encode,
  decodePublicKeyPem,
  encodePublicKeyPem,
  fromHex,
  generateKeyPair,
  keyPairFromPrivateKey,
  sha256Object,
  sign,
  toHex,
  verify,
} from '@tracemark/crypto';
import { buildGraph, parseTranscript, type IntegrityGraph } from '@tracemark/graph';
import { signGraph, verifyGraph, type SignatureDocument } from '@tracemark/sig';
import { TracemarkErrorCode } from '@tracemark/types';

const CLOCK = () => '2026-03-01T12:00:00.000Z';

function graphOf(text: string): IntegrityGraph {
  return buildGraph(parseTranscript(text), { agent: 'agent-1', clock: CLOCK }).graph;
}

const GRAPH_A = graphOf('{"type":"event","text":"a"}\n{"type":"tool_call","tool_name":"shell","payload":{"cmd":"ls"}}');
const GRAPH_B = graphOf('{"type":"event","text":"b"}\n{"type":"tool_call","tool_name":"shell","payload":{"cmd":"rm"}}');

// ---------------------------------------------------------------------------
// Known-answer vectors
// ---------------------------------------------------------------------------

describe('Ed25519 known answers', () => {
  // RFC 8032 section 7.1, test 1 (empty message).
  const SECRET = '9d61b19deffd5a60ba844af492ec2cc44449c5697b326919703bac031cae7f60';
  const PUBLIC = 'd75a980182b10ab7d54bfed3c964073a0ee172f3daa62325af021a68f707511a';
  const SIGNATURE =
    'e5564300c360ac729086e2cc806e828a84877f1eb8e5d974d873e065224901555fb8821590a33bacc61e39701cf9b46bd25bf5f0595bbe24655141438e7a100b';

  it('derives the vector public key', async () => {
    const kp = await keyPairFromPrivateKey(fromHex(SECRET));
    expect(kp.publicKeyHex).toBe(PUBLIC);
  });

  it('produces the vector signature', async () => {
    expect(toHex(await sign(new Uint8Array(0), fromHex(SECRET)))).toBe(SIGNATURE);
  });

  it('verifies the vector signature', async () => {
    expect(await verify(new Uint8Array(0), fromHex(SIGNATURE), fromHex(PUBLIC))).toBe(true);
  });

  it('rejects the vector signature over a one-byte message', async () => {
    expect(await verify(new Uint8Array([0]), fromHex(SIGNATURE), fromHex(PUBLIC))).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Signature document tampering
// ---------------------------------------------------------------------------

describe('signature document tampering', () => {
  it('rejects a signature moved from another graph', async () => {
    const kp = await generateKeyPair();
    const docA = await signGraph(GRAPH_A, kp.privateKey);
    const docB = await signGraph(GRAPH_B, kp.privateKey);

    const forged: SignatureDocument = { ...docA, graph_sha256: docB.graph_sha256 };
    expect(await verifyGraph(forged, GRAPH_B, kp.publicKey)).toEqual({
      valid: false,
      failure: 'signature_invalid',
      reason: 'Signature verification failed.',
    });
  });

  it('rejects every single-bit flip in the first signature byte', async () => {
    const kp = await generateKeyPair();
    const doc = await signGraph(GRAPH_A, kp.privateKey);
    const raw = base64Decode(doc.signature_b64);

    for (let bit = 0; bit < 8; bit++) {
      const flipped = new Uint8Array(raw);
      flipped[0] = flipped[0]! ^ (1 << bit);
      const result = await verifyGraph({ ...doc, signature_b64: base64Encode(flipped) }, GRAPH_A, kp.publicKey);
      expect(result.valid).toBe(false);
    }
  });

  it('rejects a truncated signature', async () => {
    const kp = await generateKeyPair();
    const doc = await signGraph(GRAPH_A, kp.privateKey);
    const short = base64Encode(base64Decode(doc.signature_b64).slice(0, 63));
    expect(await verifyGraph({ ...doc, signature_b64: short }, GRAPH_A, kp.publicKey)).toMatchObject({
      failure: 'signature_invalid',
    });
  });

  it('treats a signature that is not base64 as invalid', async () => {
    const kp = await generateKeyPair();
    const doc = await signGraph(GRAPH_A, kp.privateKey);
    expect(await verifyGraph({ ...doc, signature_b64: '!!not-base64!!' }, GRAPH_A, kp.publicKey)).toMatchObject({
      failure: 'signature_invalid',
    });
  });

  it('compares the digest exactly, so an uppercase digest mismatches', async () => {
    const kp = await generateKeyPair();
    const doc = await signGraph(GRAPH_A, kp.privateKey);
    const upper = { ...doc, graph_sha256: doc.graph_sha256.toUpperCase() };
    expect(await verifyGraph(upper, GRAPH_A, kp.publicKey)).toMatchObject({ failure: 'graph_hash_mismatch' });
  });

  it('rejects a graph with reordered nodes', async () => {
    const kp = await generateKeyPair();
    const doc = await signGraph(GRAPH_A, kp.privateKey);
    const reordered = { nodes: [...GRAPH_A.nodes].reverse(), edges: GRAPH_A.edges };
    expect(await verifyGraph(doc, reordered, kp.publicKey)).toMatchObject({ failure: 'graph_hash_mismatch' });
  });

  it('rejects a graph with an added member', async () => {
    const kp = await generateKeyPair();
    const doc = await signGraph(GRAPH_A, kp.privateKey);
    const extended = { ...GRAPH_A, note: 'approved' };
    expect(await verifyGraph(doc, extended, kp.publicKey)).toMatchObject({ failure: 'graph_hash_mismatch' });
  });

  it('rejects a graph whose node hash was swapped for a forged event', async () => {
    const kp = await generateKeyPair();
    const doc = await signGraph(GRAPH_A, kp.privateKey);
    const forged = structuredClone(GRAPH_A);
    forged.nodes[0]!.content_hash = sha256Object({ type: 'event', text: 'forged' });
    expect(await verifyGraph(doc, forged, kp.publicKey)).toMatchObject({ failure: 'graph_hash_mismatch' });
  });
});

// ---------------------------------------------------------------------------
// Hostile inputs
// ---------------------------------------------------------------------------

describe('hostile inputs', () => {
  it('refuses a public key of the wrong size', async () => {
    const kp = await generateKeyPair();
    const doc = await signGraph(GRAPH_A, kp.privateKey);
    await expect(verifyGraph(doc, GRAPH_A, kp.publicKey.slice(0, 31))).rejects.toMatchObject({
      name: 'CryptoError',
      code: TracemarkErrorCode.CRYPTO_INVALID_KEY,
      message: 'Public key must be 32 bytes, got 31',
    });
  });

  it('refuses to sign with a private key of the wrong size', async () => {
    await expect(signGraph(GRAPH_A, new Uint8Array(16))).rejects.toMatchObject({
      code: TracemarkErrorCode.CRYPTO_INVALID_KEY,
      message: 'Private key must be 32 bytes, got 16',
    });
  });

  it('refuses to sign a malformed graph', async () => {
    const kp = await generateKeyPair();
    const bad = structuredClone(GRAPH_A);
    bad.nodes[1]!.id = 'x2';
    await expect(signGraph(bad, kp.privateKey)).rejects.toMatchObject({
      code: TracemarkErrorCode.INPUT_INVALID_GRAPH,
    });
  });

  it('refuses to hash values JSON cannot represent', () => {
    expect(() => sha256Object({ score: Number.NaN })).toThrow('Cannot canonicalize non-finite number NaN at $.score');
  });

  it('rejects a truncated PEM block', async () => {
    const kp = await generateKeyPair();
    const pem = encodePublicKeyPem(kp.publicKey);
    const truncated = pem.slice(0, pem.length - 40);
    expect(() => decodePublicKeyPem(truncated)).toThrow(
      expect.objectContaining({ code: TracemarkErrorCode.CRYPTO_INVALID_ENCODING }),
    );
  });

  it('rejects a PEM public key of another algorithm', () => {
    const { publicKey } = generateKeyPairSync('ec', { namedCurve: 'prime256v1' });
    const pem = publicKey.export({ type: 'spki', format: 'pem' }).toString();
    expect(() => decodePublicKeyPem(pem)).toThrow('Public key is a ec key, not Ed25519');
  });
});
