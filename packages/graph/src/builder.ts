/**
 * Builds the hash-linked integrity graph (and its risk summary) from an
 * ordered transcript.
 *
 * @packageDocumentation
 */

import {
  assessText,
  assessToolCall,
  defaultChecks,
  DEFAULT_RISK_CONFIG,
  type CheckRegistry,
  type RiskConfig,
  type RiskSummary,
  type ToolDecision,
} from '@tracemark/checks';
import { sha256Object, timestamp } from '@tracemark/crypto';
import { InputError, TracemarkErrorCode, isNonEmptyString, silentLogger, type Logger } from '@tracemark/types';

import type { BuildResult, GraphEdge, GraphNode, IntegrityGraph, TranscriptEvent } from './types';

export interface GraphBuilderOptions {
  /** Agent identifier recorded in every node's metadata. */
  agent: string;
  /** Source of timestamps for events without `ts`. Defaults to the wall clock. */
  clock?: () => string;
  /** Reject events without `ts` instead of stamping them. */
  requireTimestamps?: boolean;
  checks?: CheckRegistry;
  config?: RiskConfig;
  logger?: Logger;
}

/**
 * ```ts
 * const builder = new GraphBuilder({ agent: 'agent-7' });
 * const { graph, summary } = builder.build(events);
 * ```
 */
export class GraphBuilder {
  private readonly agent: string;
  private readonly clock: () => string;
  private readonly requireTimestamps: boolean;
  private readonly checks: CheckRegistry;
  private readonly config: RiskConfig;
  private readonly logger: Logger;

  /**
   * @throws {InputError} `INPUT_INVALID_ARGUMENT` when `agent` is empty.
   */
  constructor(options: GraphBuilderOptions) {
    if (!isNonEmptyString(options.agent)) {
      throw new InputError(TracemarkErrorCode.INPUT_INVALID_ARGUMENT, 'Agent identifier must be a non-empty string', {
        hint: 'Pass --agent <id>.',
      });
    }
    this.agent = options.agent;
    this.clock = options.clock ?? timestamp;
    this.requireTimestamps = options.requireTimestamps ?? false;
    this.checks = options.checks ?? defaultChecks();
    this.config = options.config ?? DEFAULT_RISK_CONFIG;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Build only the graph. Node `i` hashes event `i` alone; edges link each
   * node to the next. The clock is read at most once, so every stamped node
   * of one build carries the same time.
   *
   * @throws {InputError} `INPUT_MISSING_TIMESTAMP` under `requireTimestamps`,
   *   `CANONICAL_UNSUPPORTED_VALUE` for events JSON cannot represent.
   */
  buildGraph(events: readonly TranscriptEvent[]): IntegrityGraph {
    const nodes: GraphNode[] = [];
    const edges: GraphEdge[] = [];
    let buildTime: string | undefined;
    let stamped = 0;

    events.forEach((event, i) => {
      const id = `n${i + 1}`;
      let ts = event.ts;
      if (ts === undefined) {
        if (this.requireTimestamps) {
          throw new InputError(
            TracemarkErrorCode.INPUT_MISSING_TIMESTAMP,
            `Event ${i + 1} has no "ts" timestamp`,
            { hint: 'Add an ISO 8601 "ts" field to every event, or drop --require-ts.', context: { index: i } },
          );
        }
        buildTime ??= this.clock();
        ts = buildTime;
        stamped++;
      }

      nodes.push({
        id,
        type: event.type ?? 'event',
        ts,
        content_hash: sha256Object(event),
        metadata: {
          agent: this.agent,
          role: event.role ?? null,
          tool_name: event.tool_name ?? null,
        },
      });

      if (i > 0) {
        edges.push({ from: `n${i}`, to: id, relation: 'follows' });
      }
    });

    if (stamped > 0) {
      this.logger.warn('events without timestamps were stamped with the build time', { count: stamped, ts: buildTime });
    }
    this.logger.debug('built graph', { agent: this.agent, nodes: nodes.length, edges: edges.length });
    return { nodes, edges };
  }

  /**
   * Score the whole transcript, and each tool call's payload on its own.
   * Tool decisions come only from tool calls; the transcript score never
   * decides a tool.
   */
  summarize(events: readonly TranscriptEvent[]): RiskSummary {
    const options = { registry: this.checks, config: this.config };
    const summary = assessText(transcriptText(events), options);

    const decisions: ToolDecision[] = [];
    for (const event of events) {
      if (event.type === 'tool_call') {
        const tool = event.tool_name ?? 'unknown';
        decisions.push(...assessToolCall(tool, JSON.stringify(event.payload ?? {}), options).tool_decisions);
      }
    }

    for (const d of decisions) {
      if (d.decision === 'deny') {
        this.logger.info('tool call denied', { tool: d.tool_name, reason: d.reason });
      }
    }
    return { ...summary, tool_decisions: decisions };
  }

  /** Build the graph and its summary. */
  build(events: readonly TranscriptEvent[]): BuildResult {
    const graph = this.buildGraph(events);
    return { graph, summary: this.summarize(events) };
  }
}

/** The text the transcript-wide checks score: one compact JSON line per event. */
export function transcriptText(events: readonly TranscriptEvent[]): string {
  return events.map((e) => JSON.stringify(e)).join('\n');
}

/** One-shot form of `new GraphBuilder(options).build(events)`. */
export function buildGraph(events: readonly TranscriptEvent[], options: GraphBuilderOptions): BuildResult {
  return new GraphBuilder(options).build(events);
}
