/**
 * Built-in heuristic checks. Each is a plain phrase or pattern scan; none
 * of them parse or understand the text.
 */

import type { CheckContext, CheckResult } from './types';

function clip(score: number): number {
  return Math.max(0, Math.min(1, score));
}

// ─── Overconfidence ─────────────────────────────────────────────────────────────

const CERTAINTY_PHRASES = [
  'definitely',
  'certainly',
  'guaranteed',
  'always',
  'without a doubt',
  'undeniably',
  '100%',
] as const;

const EVIDENCE_MARKERS = ['according to', 'evidence', 'source', 'citation', 'http://', 'https://', '[', ']'] as const;

/**
 * Flags certainty language. Each phrase counts once however often it
 * appears; evidence markers anywhere in the text lower the score by 0.4.
 */
export function overconfidenceCheck(text: string, context: CheckContext): CheckResult {
  if (!context.requireUncertainty) {
    return { name: 'overconfidence', score: 0, explanation: 'Uncertainty requirement disabled.' };
  }

  const lowered = text.toLowerCase();
  const hits = CERTAINTY_PHRASES.filter((p) => lowered.includes(p)).length;
  const hasEvidence = EVIDENCE_MARKERS.some((m) => lowered.includes(m));

  if (hits === 0) {
    return { name: 'overconfidence', score: 0, explanation: 'No overconfident certainty phrases detected.' };
  }

  let score = 0.7 + Math.min(0.3, hits * 0.1);
  if (hasEvidence) {
    score -= 0.4;
  }

  return {
    name: 'overconfidence',
    score: clip(score),
    explanation: hasEvidence
      ? 'Certainty language found, but evidence markers/citations are present.'
      : 'Certainty language found without evidence words or citations.',
  };
}

// ─── Sensitive data ─────────────────────────────────────────────────────────────

const SENSITIVE_PATTERNS: ReadonlyArray<readonly [string, RegExp]> = [
  ['email', /\b[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[A-Za-z]{2,}\b/g],
  ['phone', /\b(?:\+?1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}\b/g],
  ['ssn', /\b\d{3}-\d{2}-\d{4}\b/g],
];

/** Counts email addresses, NANP phone numbers and SSNs. */
export function sensitiveDataCheck(text: string): CheckResult {
  let total = 0;
  const kinds: string[] = [];
  for (const [kind, pattern] of SENSITIVE_PATTERNS) {
    const count = text.match(pattern)?.length ?? 0;
    if (count > 0) {
      kinds.push(kind);
      total += count;
    }
  }

  if (total === 0) {
    return { name: 'sensitive_data', score: 0, explanation: 'No email, phone number, or SSN patterns found.' };
  }

  return {
    name: 'sensitive_data',
    score: clip(0.35 + total * 0.25),
    explanation: `Detected sensitive data patterns: ${kinds.join(', ')}.`,
  };
}

// ─── Manipulation ───────────────────────────────────────────────────────────────

const COERCIVE_PHRASES = [
  'you must obey',
  'or else',
  "don't tell anyone",
  'keep this secret',
  'you have no choice',
  'immediately comply',
  'only a fool would refuse',
] as const;

/** Flags coercive phrasing. */
export function manipulationCheck(text: string): CheckResult {
  const lowered = text.toLowerCase();
  const hits = COERCIVE_PHRASES.filter((p) => lowered.includes(p));

  if (hits.length === 0) {
    return { name: 'manipulation', score: 0, explanation: 'No manipulative/coercive language detected.' };
  }

  return {
    name: 'manipulation',
    score: clip(0.4 + hits.length * 0.2),
    explanation: `Detected coercive patterns: ${hits.join(', ')}.`,
  };
}
