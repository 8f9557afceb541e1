import type { Rule } from '../domain/index.js';

function byPriority(a: Rule, b: Rule): number {
  return b.priority - a.priority;
}

/**
 * In-memory rule set held as an immutable, priority-sorted snapshot.
 *
 * Every mutation builds a new array and swaps it in, so an evaluation that
 * already holds `get()` keeps a complete snapshot, either the old one or
 * the new one, never a partial mix. Sorting is stable: rules of equal
 * priority keep their insertion order.
 */
export class RuleStore {
  private rules: readonly Rule[];

  constructor(initial: readonly Rule[] = []) {
    this.rules = [...initial].sort(byPriority);
  }

  /** Returns the current snapshot. O(1), no copy. */
  get(): readonly Rule[] {
    return this.rules;
  }

  /** Active rules only, highest priority first. */
  active(): Rule[] {
    return this.rules.filter((rule) => rule.is_active);
  }

  /** Atomically replaces the whole set and re-sorts it. */
  set(next: readonly Rule[]): void {
    this.rules = [...next].sort(byPriority);
  }

  /** Adds a rule, replacing any existing rule with the same id. */
  add(rule: Rule): void {
    this.set([...this.rules.filter((r) => r.id !== rule.id), rule]);
  }

  /** Removes a rule by id. Returns whether a rule was removed. */
  remove(ruleId: string): boolean {
    const next = this.rules.filter((r) => r.id !== ruleId);
    if (next.length === this.rules.length) return false;
    this.rules = next;
    return true;
  }
}
