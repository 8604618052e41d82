/**
 * Validation Module
 *
 * Rule registry, built-in rules, compiler and diagnostics reporter.
 */

// Types
export type {
  RuleSeverity,
  RuleScope,
  CompilationMode,
  RuleFinding,
  EdgeContext,
  GraphRule,
  EdgeRule,
  Rule,
  Violation,
  CompilationResult,
} from './types.js';

// Errors
export { DuplicateRuleError, RuleEvaluationError } from './errors.js';

// Rule Registry
export { RuleRegistry, createDefaultRegistry } from './rule-registry.js';

// Built-in rules
export {
  BUILTIN_RULES,
  OPTIONAL_RULES,
  noDuplicateGuidRule,
  mandatoryIncompatibleRule,
  monotonicGuidRule,
  conflictingRelationshipKindsRule,
  mutualRelationshipRule,
} from './rules/index.js';

// Compiler
export { compile, compileRecords, type CompileOptions, type CompiledGraph } from './compiler.js';

// Reporter
export { render, compareViolations, formatViolation, formatResult } from './reporter.js';
