import { describe, it, expect } from 'vitest';
import { assessText, assessToolCall, buildSummary, decideTool, overallScore } from './summary';
import type { CheckResult, RiskConfig } from './types';

const result = (name: string, score: number): CheckResult => ({ name, score, explanation: `${name} explanation` });

describe('buildSummary', () => {
  it('averages scores and lists non-zero checks as violations', () => {
    const summary = buildSummary([result('a', 0.6), result('b', 0), result('c', 0.6)]);
    expect(summary).toEqual({
      overall_risk_score: 0.4,
      violations: [result('a', 0.6), result('c', 0.6)],
      tool_decisions: [],
    });
  });

  it('rounds the overall score to four decimals', () => {
    expect(buildSummary([result('a', 1), result('b', 0), result('c', 0)]).overall_risk_score).toBe(0.3333);
  });

  it('handles an empty check list', () => {
    expect(buildSummary([], { toolName: 'shell' })).toEqual({
      overall_risk_score: 0,
      violations: [],
      tool_decisions: [{ tool_name: 'shell', decision: 'allow', reason: 'overall_risk_score=0.00 threshold=0.80' }],
    });
  });

  it('adds a tool decision when a tool is named', () => {
    const summary = buildSummary([result('a', 0.6), result('b', 0), result('c', 0.6)], { toolName: 'shell' });
    expect(summary.tool_decisions).toEqual([
      { tool_name: 'shell', decision: 'allow', reason: 'overall_risk_score=0.40 threshold=0.80' },
    ]);
  });

  it('denies at or above the threshold', () => {
    const summary = buildSummary([result('a', 0.5), result('b', 0.5)], { toolName: 'shell', threshold: 0.5 });
    expect(summary.tool_decisions).toEqual([
      { tool_name: 'shell', decision: 'deny', reason: 'overall_risk_score=0.50 threshold=0.50' },
    ]);
  });
});

describe('decideTool', () => {
  it('denies tools whose policy disallows them', () => {
    expect(decideTool('delete_files', 0, 0.8, [{ tool_name: 'delete_files', allow: false, conditions: 'always' }])).toEqual({
      tool_name: 'delete_files',
      decision: 'deny',
      reason: 'tool policy denies delete_files',
    });
  });

  it('falls back to the threshold when the policy allows', () => {
    expect(decideTool('shell', 1, 0.8, [{ tool_name: 'shell', allow: true }]).decision).toBe('deny');
    expect(decideTool('shell', 0.1, 0.8, [{ tool_name: 'shell', allow: true }]).decision).toBe('allow');
  });
});

describe('overallScore', () => {
  it('is the arithmetic mean', () => {
    expect(overallScore([result('a', 1), result('b', 0)])).toBe(0.5);
    expect(overallScore([])).toBe(0);
  });
});

describe('assessText / assessToolCall', () => {
  const config: RiskConfig = {
    requireUncertainty: true,
    overallDeny: 0.8,
    toolPolicies: [{ tool_name: 'delete_files', allow: false }],
  };

  it('summarizes text without tool decisions', () => {
    const summary = assessText('You must obey and keep this secret.', { config });
    expect(summary.violations.map((v) => v.name)).toEqual(['manipulation']);
    expect(summary.tool_decisions).toEqual([]);
  });

  it('allows a harmless tool call', () => {
    expect(assessToolCall('shell', '{"cmd":"ls"}', { config })).toEqual({
      overall_risk_score: 0,
      violations: [],
      tool_decisions: [{ tool_name: 'shell', decision: 'allow', reason: 'overall_risk_score=0.00 threshold=0.80' }],
    });
  });

  it('applies tool policies', () => {
    expect(assessToolCall('delete_files', '{}', { config }).tool_decisions[0]?.decision).toBe('deny');
  });

  it('respects a disabled uncertainty requirement', () => {
    const relaxed = { ...config, requireUncertainty: false };
    expect(assessText('definitely', { config: relaxed }).violations).toEqual([]);
  });
});
