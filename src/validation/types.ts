/**
 * Validation Module Types
 *
 * Types for rule definitions, violations and compilation results.
 */

import type { Feature, Relationship } from '../shared/types/feature.js';
import type { FeatureGraph } from '../graph-engine/feature-graph.js';

/**
 * Rule severity levels (ERROR always blocks, WARNING blocks in STRICT mode)
 */
export type RuleSeverity = 'ERROR' | 'WARNING';

/**
 * What a rule is evaluated against
 */
export type RuleScope = 'GRAPH' | 'EDGE';

/**
 * Pass/fail policy for warnings
 */
export type CompilationMode = 'STRICT' | 'LENIENT';

/**
 * Finding returned by a rule; the compiler stamps rule id and severity
 */
export interface RuleFinding {
  guids: readonly number[];
  message: string;
}

/**
 * Inputs of an EDGE-scoped rule
 */
export interface EdgeContext {
  relationship: Relationship;
  source: Feature;
  target: Feature;
  graph: FeatureGraph;
}

interface RuleBase {
  id: string;
  description: string;
  severity: RuleSeverity;
}

/**
 * Rule evaluated once against the whole graph
 */
export interface GraphRule extends RuleBase {
  scope: 'GRAPH';
  evaluate(graph: FeatureGraph): readonly RuleFinding[];
}

/**
 * Rule evaluated once per relationship
 */
export interface EdgeRule extends RuleBase {
  scope: 'EDGE';
  evaluate(context: EdgeContext): readonly RuleFinding[];
}

export type Rule = GraphRule | EdgeRule;

/**
 * Rule violation from evaluation
 */
export interface Violation {
  ruleId: string;
  severity: RuleSeverity;
  guids: readonly number[];
  message: string;
}

/**
 * Compilation result summary
 */
export interface CompilationResult {
  isValid: boolean;
  mode: CompilationMode;
  violations: Violation[];
  errorCount: number;
  warningCount: number;
}
