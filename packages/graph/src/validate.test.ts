import { describe, it, expect } from 'vitest';
import { TracemarkErrorCode } from '@tracemark/types';
import { buildGraph } from './builder';
import { assertIntegrityGraph, isIntegrityGraph, validateGraph } from './validate';

const HASH = 'a'.repeat(64);

function node(id: string): Record<string, unknown> {
  return { id, type: 'event', ts: '2026-01-01T00:00:00Z', content_hash: HASH, metadata: { agent: 'a', role: null, tool_name: null } };
}

describe('validateGraph', () => {
  it('accepts graphs produced by the builder', () => {
    const { graph } = buildGraph([{ type: 'event' }, { type: 'event' }, { type: 'event' }], { agent: 'a' });
    expect(validateGraph(graph)).toEqual({ valid: true, errors: [] });
    expect(isIntegrityGraph(graph)).toBe(true);
  });

  it('accepts the empty graph', () => {
    expect(validateGraph({ nodes: [], edges: [] }).valid).toBe(true);
  });

  it('reports shape errors with paths', () => {
    const result = validateGraph({ nodes: [{ ...node('n1'), content_hash: 'XYZ' }] });
    expect(result.errors.map((e) => `${e.path} ${e.message}`)).toEqual([
      'edges is required',
      'nodes[0].content_hash must match pattern ^[0-9a-f]{64}$',
    ]);
  });

  it('rejects non-objects', () => {
    expect(validateGraph([]).errors).toEqual([{ path: '', message: 'must be an object', value: [] }]);
  });

  it('requires sequential node ids', () => {
    const result = validateGraph({ nodes: [node('n1'), node('n3')], edges: [{ from: 'n1', to: 'n3', relation: 'follows' }] });
    expect(result.errors.map((e) => `${e.path} ${e.message}`)).toEqual(['nodes[1].id must be "n2"']);
  });

  it('requires each edge to link consecutive nodes', () => {
    const result = validateGraph({
      nodes: [node('n1'), node('n2'), node('n3')],
      edges: [
        { from: 'n1', to: 'n3', relation: 'follows' },
        { from: 'n2', to: 'n3', relation: 'follows' },
      ],
    });
    expect(result.errors.map((e) => `${e.path} ${e.message}`)).toEqual(['edges[0] must link n1 to n2']);
  });

  it('requires one edge per consecutive pair', () => {
    const result = validateGraph({ nodes: [node('n1'), node('n2'), node('n3')], edges: [{ from: 'n1', to: 'n2', relation: 'follows' }] });
    expect(result.errors.map((e) => `${e.path} ${e.message}`)).toEqual(['edges must have 2 entries for 3 nodes']);
  });

  it('rejects edges to missing nodes and other relations', () => {
    expect(
      validateGraph({ nodes: [node('n1'), node('n2')], edges: [{ from: 'n1', to: 'n9', relation: 'follows' }] }).errors[0],
    ).toMatchObject({ path: 'edges[0]', message: 'must reference existing nodes' });
    expect(
      validateGraph({ nodes: [node('n1'), node('n2')], edges: [{ from: 'n1', to: 'n2', relation: 'causes' }] }).errors[0],
    ).toMatchObject({ path: 'edges[0].relation', message: 'must be "follows"' });
  });
});

describe('assertIntegrityGraph', () => {
  it('throws an input error listing the problems', () => {
    expect(() => assertIntegrityGraph({ nodes: 'x', edges: [] }, 'graph.json')).toThrow(
      expect.objectContaining({
        code: TracemarkErrorCode.INPUT_INVALID_GRAPH,
        message: 'Invalid graph.json: nodes must be an array',
      }),
    );
  });

  it('returns the graph when valid', () => {
    const graph = { nodes: [node('n1')], edges: [] };
    expect(assertIntegrityGraph(graph)).toBe(graph);
  });
});
