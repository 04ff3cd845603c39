/**
 * Structural and chain validation of integrity graphs.
 */

import {
  InputError,
  TracemarkErrorCode,
  formatSchemaErrors,
  validateSchema,
  type FieldSchema,
  type SchemaValidationError,
  type SchemaValidationResult,
} from '@tracemark/types';

import type { IntegrityGraph } from './types';

const NODE_SCHEMA: FieldSchema = {
  type: 'object',
  required: ['id', 'type', 'ts', 'content_hash', 'metadata'],
  properties: {
    id: { type: 'string', minLength: 1 },
    type: { type: 'string' },
    ts: { type: 'string' },
    content_hash: { type: 'string', pattern: /^[0-9a-f]{64}$/ },
    metadata: {
      type: 'object',
      required: ['agent'],
      properties: {
        agent: { type: 'string', minLength: 1 },
        role: { type: 'string', nullable: true },
        tool_name: { type: 'string', nullable: true },
      },
    },
  },
};

const EDGE_SCHEMA: FieldSchema = {
  type: 'object',
  required: ['from', 'to', 'relation'],
  properties: {
    from: { type: 'string' },
    to: { type: 'string' },
    relation: { type: 'string', const: 'follows' },
  },
};

/** Shape of a serialized {@link IntegrityGraph}. */
export const GRAPH_SCHEMA: FieldSchema = {
  type: 'object',
  required: ['nodes', 'edges'],
  properties: {
    nodes: { type: 'array', items: NODE_SCHEMA },
    edges: { type: 'array', items: EDGE_SCHEMA },
  },
};

function field(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? new Map<string, unknown>(Object.entries(value)).get(key)
    : undefined;
}

/**
 * Chain rules on top of the shape: node `i` has id `n<i+1>`, and edge `i`
 * links node `i` to node `i+1`. Run only on shape-valid graphs.
 */
function chainErrors(nodes: readonly unknown[], edges: readonly unknown[]): SchemaValidationError[] {
  const errors: SchemaValidationError[] = [];
  const ids = nodes.map((n) => field(n, 'id'));

  ids.forEach((id, i) => {
    if (id !== `n${i + 1}`) {
      errors.push({ path: `nodes[${i}].id`, message: `must be "n${i + 1}"`, value: id });
    }
  });

  const expectedEdges = Math.max(0, nodes.length - 1);
  if (edges.length !== expectedEdges) {
    errors.push({ path: 'edges', message: `must have ${expectedEdges} entries for ${nodes.length} nodes`, value: edges.length });
  }

  edges.forEach((edge, i) => {
    const from = field(edge, 'from');
    const to = field(edge, 'to');
    if (!ids.includes(from) || !ids.includes(to)) {
      errors.push({ path: `edges[${i}]`, message: 'must reference existing nodes', value: { from, to } });
    } else if (from !== ids[i] || to !== ids[i + 1]) {
      errors.push({ path: `edges[${i}]`, message: `must link ${String(ids[i])} to ${String(ids[i + 1])}`, value: { from, to } });
    }
  });

  return errors;
}

/**
 * Validate a value as an {@link IntegrityGraph}: shape first, then chain
 * integrity. All errors are collected.
 *
 * @example
 * ```typescript
 * const result = validateGraph(JSON.parse(text));
 * if (!result.valid) console.error(result.errors);
 * ```
 */
export function validateGraph(value: unknown): SchemaValidationResult {
  const shape = validateSchema(value, GRAPH_SCHEMA);
  if (!shape.valid) {
    return shape;
  }
  const nodes = field(value, 'nodes');
  const edges = field(value, 'edges');
  const errors = Array.isArray(nodes) && Array.isArray(edges) ? chainErrors(nodes, edges) : [];
  return { valid: errors.length === 0, errors };
}

/** Type guard over {@link validateGraph}. */
export function isIntegrityGraph(value: unknown): value is IntegrityGraph {
  return validateGraph(value).valid;
}

/**
 * Narrow `value` to an {@link IntegrityGraph} or throw.
 *
 * @throws {InputError} `INPUT_INVALID_GRAPH` listing every problem.
 */
export function assertIntegrityGraph(value: unknown, source = 'graph'): IntegrityGraph {
  if (isIntegrityGraph(value)) {
    return value;
  }
  const { errors } = validateGraph(value);
  throw new InputError(TracemarkErrorCode.INPUT_INVALID_GRAPH, `Invalid ${source}: ${formatSchemaErrors(errors)}`, {
    hint: 'Graphs are objects of the form {"nodes": [...], "edges": [...]} as written by `tracemark run`.',
    context: { errors },
  });
}
