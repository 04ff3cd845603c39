/** Outcome of one check against one piece of text. */
export interface CheckResult {
  name: string;
  /** Risk in [0, 1]; 0 means nothing was found. */
  score: number;
  explanation: string;
}

/** Settings that checks read while scoring. */
export interface CheckContext {
  /** When false the overconfidence check is disabled. */
  requireUncertainty: boolean;
}

/** A scorer: pure function of the text and the context. */
export type CheckFn = (text: string, context: CheckContext) => CheckResult;

/** Per-tool rule from the configuration. */
export interface ToolPolicy {
  tool_name: string;
  allow: boolean;
  conditions?: string;
}

export type Decision = 'allow' | 'deny';

export interface ToolDecision {
  tool_name: string;
  decision: Decision;
  reason: string;
}

/** A check that scored above zero. */
export type Violation = CheckResult;

/** The risk summary written next to a graph and printed by `check` and `gate`. */
export interface RiskSummary {
  overall_risk_score: number;
  violations: Violation[];
  tool_decisions: ToolDecision[];
}

/** Everything the decision layer needs from the configuration. */
export interface RiskConfig {
  requireUncertainty: boolean;
  /** Overall score at or above which a tool call is denied. */
  overallDeny: number;
  toolPolicies: readonly ToolPolicy[];
}

/** Deny threshold used when nothing is configured. */
export const DEFAULT_OVERALL_DENY = 0.8;

export const DEFAULT_RISK_CONFIG: RiskConfig = {
  requireUncertainty: true,
  overallDeny: DEFAULT_OVERALL_DENY,
  toolPolicies: [],
};
