import { InputError, TracemarkErrorCode, isNonEmptyString } from '@tracemark/types';

import { manipulationCheck, overconfidenceCheck, sensitiveDataCheck } from './checks';
import type { CheckContext, CheckFn, CheckResult } from './types';

/**
 * Named table of checks. Checks run in registration order, and the order of
 * results (and so of violations) follows it.
 *
 * ```ts
 * const registry = defaultChecks();
 * registry.register('profanity', (text) => ({ name: 'profanity', score: 0, explanation: 'None found.' }));
 * const results = registry.runAll('some text', { requireUncertainty: true });
 * ```
 */
export class CheckRegistry {
  private readonly checks: Map<string, CheckFn> = new Map();

  /**
   * Add a check under `name`.
   *
   * @throws {InputError} When the name is empty or already taken.
   */
  register(name: string, check: CheckFn): this {
    if (!isNonEmptyString(name)) {
      throw new InputError(TracemarkErrorCode.INPUT_INVALID_ARGUMENT, 'Check name must be a non-empty string');
    }
    if (this.checks.has(name)) {
      throw new InputError(
        TracemarkErrorCode.INPUT_INVALID_ARGUMENT,
        `A check named '${name}' is already registered`,
        { hint: 'Unregister the existing check first.' },
      );
    }
    this.checks.set(name, check);
    return this;
  }

  /** Remove a check. Returns whether it was registered. */
  unregister(name: string): boolean {
    return this.checks.delete(name);
  }

  has(name: string): boolean {
    return this.checks.has(name);
  }

  names(): string[] {
    return [...this.checks.keys()];
  }

  get size(): number {
    return this.checks.size;
  }

  /** Run every registered check against `text`. */
  runAll(text: string, context: CheckContext): CheckResult[] {
    const results: CheckResult[] = [];
    for (const check of this.checks.values()) {
      results.push(check(text, context));
    }
    return results;
  }
}

/** A registry holding overconfidence, sensitive_data and manipulation, in that order. */
export function defaultChecks(): CheckRegistry {
  return new CheckRegistry()
    .register('overconfidence', overconfidenceCheck)
    .register('sensitive_data', (text) => sensitiveDataCheck(text))
    .register('manipulation', (text) => manipulationCheck(text));
}
