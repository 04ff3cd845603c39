/**
 * @tracemark/checks - Heuristic text-risk checks and tool gating.
 *
 * @packageDocumentation
 */

export type {
  CheckResult,
  CheckContext,
  CheckFn,
  ToolPolicy,
  Decision,
  ToolDecision,
  Violation,
  RiskSummary,
  RiskConfig,
} from './types';
export { DEFAULT_OVERALL_DENY, DEFAULT_RISK_CONFIG } from './types';

export { overconfidenceCheck, sensitiveDataCheck, manipulationCheck } from './checks';
export { CheckRegistry, defaultChecks } from './registry';
export { buildSummary, decideTool, overallScore, assessText, assessToolCall } from './summary';
export type { SummaryOptions, AssessOptions } from './summary';
