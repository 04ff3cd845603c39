import type { JsonValue } from '@tracemark/types';
import type { RiskSummary } from '@tracemark/checks';

/**
 * One transcript record. The named fields are interpreted; every other
 * field is kept and is part of the event's content hash.
 */
export interface TranscriptEvent {
  /** `"event"`, `"tool_call"`, or any other tag. */
  type?: string;
  /** ISO 8601 timestamp. */
  ts?: string;
  /** `null` reads as absent. */
  role?: string | null;
  tool_name?: string | null;
  payload?: JsonValue;
  [key: string]: JsonValue | undefined;
}

export interface NodeMetadata {
  agent: string;
  role: string | null;
  tool_name: string | null;
}

export interface GraphNode {
  /** `n1`, `n2`, ... in transcript order. */
  id: string;
  type: string;
  ts: string;
  /** SHA-256 of the source event's canonical JSON. */
  content_hash: string;
  metadata: NodeMetadata;
}

export type EdgeRelation = 'follows';

export interface GraphEdge {
  from: string;
  to: string;
  relation: EdgeRelation;
}

/** A hash-linked chain of transcript events. */
export interface IntegrityGraph {
  nodes: GraphNode[];
  edges: GraphEdge[];
}

/** What a build produces: the graph that gets signed and the risk summary beside it. */
export interface BuildResult {
  graph: IntegrityGraph;
  summary: RiskSummary;
}
