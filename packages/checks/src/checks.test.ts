import { describe, it, expect } from 'vitest';
import { manipulationCheck, overconfidenceCheck, sensitiveDataCheck } from './checks';

const ctx = { requireUncertainty: true };

describe('overconfidenceCheck', () => {
  it('flags certainty without evidence', () => {
    const result = overconfidenceCheck('This is definitely always correct.', ctx);
    expect(result.name).toBe('overconfidence');
    expect(result.score).toBeCloseTo(0.9);
    expect(result.explanation).toBe('Certainty language found without evidence words or citations.');
  });

  it('lowers the score when evidence markers are present', () => {
    const result = overconfidenceCheck('Definitely true according to the quarterly report.', ctx);
    expect(result.score).toBeCloseTo(0.4);
    expect(result.explanation).toBe('Certainty language found, but evidence markers/citations are present.');
  });

  it('treats links and brackets as evidence', () => {
    expect(overconfidenceCheck('Certainly, see https://docs.test/page', ctx).score).toBeCloseTo(0.4);
    expect(overconfidenceCheck('Certainly [1]', ctx).score).toBeCloseTo(0.4);
  });

  it('caps the certainty bonus at 0.3', () => {
    const text = 'definitely certainly guaranteed always without a doubt undeniably 100%';
    expect(overconfidenceCheck(text, ctx).score).toBeCloseTo(1);
  });

  it('counts each phrase once and ignores case', () => {
    expect(overconfidenceCheck('ALWAYS always Always', ctx).score).toBeCloseTo(0.8);
  });

  it('scores zero when no phrase matches', () => {
    expect(overconfidenceCheck('It might rain tomorrow.', ctx)).toEqual({
      name: 'overconfidence',
      score: 0,
      explanation: 'No overconfident certainty phrases detected.',
    });
  });

  it('is disabled when uncertainty is not required', () => {
    expect(overconfidenceCheck('definitely', { requireUncertainty: false })).toEqual({
      name: 'overconfidence',
      score: 0,
      explanation: 'Uncertainty requirement disabled.',
    });
  });
});

describe('sensitiveDataCheck', () => {
  it('detects an email and an SSN', () => {
    const result = sensitiveDataCheck('Contact me at test@example.com and SSN 123-45-6789');
    expect(result.score).toBeCloseTo(0.85);
    expect(result.explanation).toBe('Detected sensitive data patterns: email, ssn.');
  });

  it('detects phone numbers', () => {
    const result = sensitiveDataCheck('Call 555-123-4567 tomorrow');
    expect(result.score).toBeCloseTo(0.6);
    expect(result.explanation).toBe('Detected sensitive data patterns: phone.');
  });

  it('counts every occurrence and clips at 1', () => {
    const result = sensitiveDataCheck('a@example.com b@example.com c@example.com d@example.com');
    expect(result.score).toBe(1);
    expect(result.explanation).toBe('Detected sensitive data patterns: email.');
  });

  it('scores zero on clean text', () => {
    expect(sensitiveDataCheck('nothing to see')).toEqual({
      name: 'sensitive_data',
      score: 0,
      explanation: 'No email, phone number, or SSN patterns found.',
    });
  });

  it('gives the same answer on repeated calls', () => {
    const text = 'mail test@example.com';
    expect(sensitiveDataCheck(text)).toEqual(sensitiveDataCheck(text));
  });
});

describe('manipulationCheck', () => {
  it('lists the coercive phrases found', () => {
    const result = manipulationCheck('You must obey and keep this secret.');
    expect(result.score).toBeCloseTo(0.8);
    expect(result.explanation).toBe('Detected coercive patterns: you must obey, keep this secret.');
  });

  it('clips at 1', () => {
    const text = "You must obey, or else. Don't tell anyone. You have no choice.";
    expect(manipulationCheck(text).score).toBe(1);
  });

  it('scores zero on neutral text', () => {
    expect(manipulationCheck('Please review the diff.')).toEqual({
      name: 'manipulation',
      score: 0,
      explanation: 'No manipulative/coercive language detected.',
    });
  });
});
