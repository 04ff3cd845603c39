/**
 * @tracemark/graph - Signed Integrity Graph construction.
 *
 * Turns an ordered agent transcript into a chain of content-addressed nodes
 * (`n1 → n2 → …`) plus a risk summary, and validates graphs read back from disk.
 *
 * @packageDocumentation
 */

export type {
  TranscriptEvent,
  NodeMetadata,
  GraphNode,
  GraphEdge,
  EdgeRelation,
  IntegrityGraph,
  BuildResult,
} from './types';

export { GraphBuilder, buildGraph, transcriptText } from './builder';
export type { GraphBuilderOptions } from './builder';

export { parseTranscript, toTranscriptEvent } from './transcript';
export { validateGraph, isIntegrityGraph, assertIntegrityGraph, GRAPH_SCHEMA } from './validate';
export { readTranscriptFile, writeBuildResult, GRAPH_FILE, SUMMARY_FILE } from './files';
