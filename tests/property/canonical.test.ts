/**
 * Property-style tests for canonical JSON, hashing and graph signatures.
 *
 * Inputs come from small random generators seeded by crypto.getRandomValues;
 * each property runs ITERATIONS times.
 *
 * Covers: @tracemark/crypto, @tracemark/graph, @tracemark/sig
 */

import { describe, it, expect } from 'vitest';

import { canonicalizeJson, generateKeyPair, sha256Object } from '@tracemark/crypto';
import { buildGraph, type TranscriptEvent } from '@tracemark/graph';
import { signGraph, verifyGraph } from '@tracemark/sig';

// ---------------------------------------------------------------------------
// Random generators
// ---------------------------------------------------------------------------

const ITERATIONS = 20;

function randomInt(min: number, max: number): number {
  const buf = new Uint32Array(1);
  crypto.getRandomValues(buf);
  return min + (buf[0]! % (max - min + 1));
}

function randomString(n: number): string {
  const chars = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789 _-é"\\';
  let result = '';
  for (let i = 0; i < n; i++) {
    result += chars[randomInt(0, chars.length - 1)];
  }
  return result;
}

function randomJson(depth: number): unknown {
  const kind = randomInt(0, depth > 0 ? 6 : 3);
  switch (kind) {
    case 0:
      return null;
    case 1:
      return randomInt(0, 1) === 1;
    case 2:
      return randomInt(-1_000_000, 1_000_000) / randomInt(1, 100);
    case 3:
      return randomString(randomInt(0, 12));
    case 4: {
      const items: unknown[] = [];
      for (let i = randomInt(0, 4); i > 0; i--) {
        items.push(randomJson(depth - 1));
      }
      return items;
    }
    default: {
      const obj: Record<string, unknown> = {};
      for (let i = randomInt(0, 5); i > 0; i--) {
        obj[randomString(randomInt(1, 6))] = randomJson(depth - 1);
      }
      return obj;
    }
  }
}

/** Same members, keys inserted in reverse order at every depth. */
function reverseKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(reverseKeys);
  }
  if (typeof value === 'object' && value !== null) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value).reverse()) {
      out[k] = reverseKeys(v);
    }
    return out;
  }
  return value;
}

function randomTranscript(): TranscriptEvent[] {
  const events: TranscriptEvent[] = [];
  for (let i = randomInt(1, 8); i > 0; i--) {
    if (randomInt(0, 1) === 1) {
      events.push({ type: 'tool_call', tool_name: randomString(5), payload: { arg: randomString(8) } });
    } else {
      events.push({ type: 'event', role: 'assistant', text: randomString(20) });
    }
  }
  return events;
}

function property(name: string, check: () => void | Promise<void>): void {
  it(name, async () => {
    for (let i = 0; i < ITERATIONS; i++) {
      await check();
    }
  });
}

const CLOCK = () => '2026-03-01T12:00:00.000Z';

// ---------------------------------------------------------------------------
// Canonical JSON
// ---------------------------------------------------------------------------

describe('canonicalizeJson properties', () => {
  property('is independent of key insertion order', () => {
    const value = randomJson(3);
    expect(canonicalizeJson(reverseKeys(value))).toBe(canonicalizeJson(value));
  });

  property('parses back to an equal value', () => {
    const value = randomJson(3);
    expect(JSON.parse(canonicalizeJson(value))).toEqual(value);
  });

  property('is a fixed point', () => {
    const once = canonicalizeJson(randomJson(3));
    expect(canonicalizeJson(JSON.parse(once))).toBe(once);
  });

  property('ignores the formatting of the source text', () => {
    const value = randomJson(3);
    const pretty: unknown = JSON.parse(JSON.stringify(value, null, randomInt(1, 8)));
    expect(canonicalizeJson(pretty)).toBe(canonicalizeJson(value));
  });

  property('emits no whitespace outside strings', () => {
    const value = { n: randomInt(0, 9), list: [randomInt(0, 9), null, true] };
    expect(canonicalizeJson(value)).not.toMatch(/\s/);
  });
});

// ---------------------------------------------------------------------------
// Hashing
// ---------------------------------------------------------------------------

describe('sha256Object properties', () => {
  property('yields 64 lowercase hex digits', () => {
    expect(sha256Object(randomJson(2))).toMatch(/^[0-9a-f]{64}$/);
  });

  property('changes when a member value changes', () => {
    const base = { key: randomString(10) };
    expect(sha256Object({ key: `${base.key}!` })).not.toBe(sha256Object(base));
  });
});

// ---------------------------------------------------------------------------
// Graph signatures
// ---------------------------------------------------------------------------

describe('graph signature properties', () => {
  property('builds a chain of n nodes and n-1 edges', () => {
    const events = randomTranscript();
    const { graph } = buildGraph(events, { agent: 'agent-1', clock: CLOCK });
    expect(graph.nodes).toHaveLength(events.length);
    expect(graph.edges).toHaveLength(events.length - 1);
    graph.edges.forEach((e, i) => {
      expect(e).toEqual({ from: `n${i + 1}`, to: `n${i + 2}`, relation: 'follows' });
    });
  });

  property('hashes each event on its own', () => {
    const events = randomTranscript();
    const { graph } = buildGraph(events, { agent: 'agent-1', clock: CLOCK });
    graph.nodes.forEach((node, i) => {
      expect(node.content_hash).toBe(sha256Object(events[i]));
    });
  });

  property('builds the same graph twice from the same events', () => {
    const events = randomTranscript();
    const a = buildGraph(events, { agent: 'agent-1', clock: CLOCK });
    const b = buildGraph(events, { agent: 'agent-1', clock: CLOCK });
    expect(canonicalizeJson(a.graph)).toBe(canonicalizeJson(b.graph));
  });

  property('verifies what it signs and rejects another agent', async () => {
    const events = randomTranscript();
    const kp = await generateKeyPair();
    const { graph } = buildGraph(events, { agent: 'agent-1', clock: CLOCK });
    const doc = await signGraph(graph, kp.privateKey);

    expect((await verifyGraph(doc, graph, kp.publicKey)).valid).toBe(true);

    const other = buildGraph(events, { agent: 'agent-2', clock: CLOCK }).graph;
    const result = await verifyGraph(doc, other, kp.publicKey);
    expect(result).toMatchObject({ valid: false, failure: 'graph_hash_mismatch' });
  });
});
