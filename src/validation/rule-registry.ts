/**
 * Rule Registry
 *
 * Explicit catalog of rules keyed by id. Enumeration follows registration
 * order, which the compiler uses for evaluation order.
 */

import { DuplicateRuleError } from './errors.js';
import { BUILTIN_RULES } from './rules/index.js';
import type { EdgeRule, GraphRule, Rule } from './types.js';

/**
 * Rule Registry
 */
export class RuleRegistry {
  // Map iteration order is insertion order
  private readonly rules = new Map<string, Rule>();

  constructor(rules: readonly Rule[] = []) {
    this.registerAll(rules);
  }

  /**
   * Register a rule
   *
   * @throws DuplicateRuleError if the id is taken
   */
  register(rule: Rule): this {
    if (this.rules.has(rule.id)) {
      throw new DuplicateRuleError(rule.id);
    }
    this.rules.set(rule.id, rule);
    return this;
  }

  registerAll(rules: readonly Rule[]): this {
    for (const rule of rules) {
      this.register(rule);
    }
    return this;
  }

  has(ruleId: string): boolean {
    return this.rules.has(ruleId);
  }

  get(ruleId: string): Rule | undefined {
    return this.rules.get(ruleId);
  }

  get size(): number {
    return this.rules.size;
  }

  /**
   * All rules in registration order
   */
  list(): Rule[] {
    return [...this.rules.values()];
  }

  graphRules(): GraphRule[] {
    return this.list().filter((r): r is GraphRule => r.scope === 'GRAPH');
  }

  edgeRules(): EdgeRule[] {
    return this.list().filter((r): r is EdgeRule => r.scope === 'EDGE');
  }
}

/**
 * Create a registry with the built-in rules pre-registered
 */
export function createDefaultRegistry(): RuleRegistry {
  return new RuleRegistry(BUILTIN_RULES);
}
