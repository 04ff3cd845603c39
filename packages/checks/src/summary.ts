/**
 * Risk aggregation and the allow/deny decision for tool calls.
 */

import { defaultChecks, type CheckRegistry } from './registry';
import {
  DEFAULT_OVERALL_DENY,
  DEFAULT_RISK_CONFIG,
  type CheckResult,
  type RiskConfig,
  type RiskSummary,
  type ToolDecision,
  type ToolPolicy,
} from './types';

export interface SummaryOptions {
  /** When set, the summary carries one decision for this tool. */
  toolName?: string;
  /** Deny threshold. Defaults to 0.8. */
  threshold?: number;
  policies?: readonly ToolPolicy[];
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/** Mean of the scores; 0 for an empty list. */
export function overallScore(checks: readonly CheckResult[]): number {
  if (checks.length === 0) {
    return 0;
  }
  return checks.reduce((sum, c) => sum + c.score, 0) / checks.length;
}

/**
 * Decide whether `toolName` may run. A policy with `allow: false` for the
 * tool denies outright; otherwise the call is denied when the overall score
 * reaches the threshold.
 */
export function decideTool(
  toolName: string,
  overall: number,
  threshold: number = DEFAULT_OVERALL_DENY,
  policies: readonly ToolPolicy[] = [],
): ToolDecision {
  const blocked = policies.find((p) => p.tool_name === toolName && !p.allow);
  if (blocked) {
    return { tool_name: toolName, decision: 'deny', reason: `tool policy denies ${toolName}` };
  }
  return {
    tool_name: toolName,
    decision: overall >= threshold ? 'deny' : 'allow',
    reason: `overall_risk_score=${overall.toFixed(2)} threshold=${threshold.toFixed(2)}`,
  };
}

/**
 * Aggregate check results into a {@link RiskSummary}.
 *
 * @example
 * ```typescript
 * buildSummary([{ name: 'manipulation', score: 0.6, explanation: '...' }], { toolName: 'shell' });
 * // { overall_risk_score: 0.6, violations: [...], tool_decisions: [{ tool_name: 'shell', decision: 'allow', ... }] }
 * ```
 */
export function buildSummary(checks: readonly CheckResult[], options?: SummaryOptions): RiskSummary {
  const overall = overallScore(checks);
  const toolName = options?.toolName;
  return {
    overall_risk_score: round4(overall),
    violations: checks.filter((c) => c.score > 0).map((c) => ({ ...c })),
    tool_decisions:
      toolName !== undefined && toolName.length > 0
        ? [decideTool(toolName, overall, options?.threshold ?? DEFAULT_OVERALL_DENY, options?.policies)]
        : [],
  };
}

/** Options shared by {@link assessText} and {@link assessToolCall}. */
export interface AssessOptions {
  registry?: CheckRegistry;
  config?: RiskConfig;
}

/** Run every check over `text` and summarize, without a tool decision. */
export function assessText(text: string, options?: AssessOptions): RiskSummary {
  const config = options?.config ?? DEFAULT_RISK_CONFIG;
  const registry = options?.registry ?? defaultChecks();
  return buildSummary(registry.runAll(text, { requireUncertainty: config.requireUncertainty }), {
    threshold: config.overallDeny,
  });
}

/** Score a tool call's payload text on its own and decide on the tool. */
export function assessToolCall(toolName: string, payloadText: string, options?: AssessOptions): RiskSummary {
  const config = options?.config ?? DEFAULT_RISK_CONFIG;
  const registry = options?.registry ?? defaultChecks();
  return buildSummary(registry.runAll(payloadText, { requireUncertainty: config.requireUncertainty }), {
    toolName,
    threshold: config.overallDeny,
    policies: config.toolPolicies,
  });
}
