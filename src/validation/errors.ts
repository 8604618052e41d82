/**
 * Validation Error Types
 *
 * Engine-level failures. Rule violations are data, not errors.
 */

/**
 * Thrown when registering a rule whose id is already taken
 */
export class DuplicateRuleError extends Error {
  constructor(public readonly ruleId: string) {
    super(`Rule '${ruleId}' is already registered`);
    this.name = 'DuplicateRuleError';
  }
}

/**
 * Thrown when a rule throws or returns something other than findings.
 * Points at a bug in the rule, never at the input graph.
 */
export class RuleEvaluationError extends Error {
  constructor(
    public readonly ruleId: string,
    public readonly subject: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Rule '${ruleId}' failed on ${subject}: ${reason}`, { cause });
    this.name = 'RuleEvaluationError';
  }
}
