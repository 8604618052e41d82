/**
 * Compiler
 *
 * Runs every registered rule against an immutable graph:
 * - GRAPH rules once against the whole graph
 * - EDGE rules once per relationship, in guid-then-declaration order
 * - Rules visited in registry order
 *
 * Violations are accumulated, never fail-fast, and passed through the
 * reporter. A rule that throws or returns malformed findings aborts the
 * run with RuleEvaluationError. No logging or other side effects here.
 */

import { FeatureGraph, type BuildOptions } from '../graph-engine/feature-graph.js';
import type { FeatureRecord, Relationship } from '../shared/types/feature.js';
import { RuleEvaluationError } from './errors.js';
import { render } from './reporter.js';
import { createDefaultRegistry, type RuleRegistry } from './rule-registry.js';
import type { CompilationMode, CompilationResult, Rule, RuleFinding, Violation } from './types.js';

/**
 * Options for compiling raw records
 */
export interface CompileOptions extends BuildOptions {
  mode?: CompilationMode;
}

/**
 * Validated graph plus its diagnostics
 */
export interface CompiledGraph {
  graph: FeatureGraph;
  result: CompilationResult;
}

function isFinding(value: unknown): value is RuleFinding {
  return (
    typeof value === 'object' &&
    value !== null &&
    'guids' in value &&
    Array.isArray(value.guids) &&
    value.guids.every((g: unknown) => Number.isInteger(g)) &&
    'message' in value &&
    typeof value.message === 'string'
  );
}

function describeEdge(relationship: Relationship): string {
  return `relationship ${relationship.sourceGuid} -> ${relationship.targetGuid} (${relationship.rel})`;
}

/**
 * Evaluate one (rule, subject) unit and stamp its findings
 */
function runUnit(rule: Rule, subject: string, evaluate: () => unknown): Violation[] {
  let findings: unknown;
  try {
    findings = evaluate();
  } catch (error) {
    throw new RuleEvaluationError(rule.id, subject, error);
  }

  if (!Array.isArray(findings)) {
    throw new RuleEvaluationError(rule.id, subject, new TypeError('rule did not return an array of findings'));
  }

  const violations: Violation[] = [];
  for (const finding of findings) {
    if (!isFinding(finding)) {
      throw new RuleEvaluationError(rule.id, subject, new TypeError('rule returned a malformed finding'));
    }
    violations.push({
      ruleId: rule.id,
      severity: rule.severity,
      guids: [...finding.guids],
      message: finding.message,
    });
  }
  return violations;
}

/**
 * Compile a graph against a registry
 *
 * @throws RuleEvaluationError when a rule misbehaves
 */
export function compile(
  graph: FeatureGraph,
  registry: RuleRegistry,
  mode: CompilationMode = 'LENIENT'
): CompilationResult {
  const violations: Violation[] = [];

  for (const rule of registry.list()) {
    if (rule.scope === 'GRAPH') {
      violations.push(...runUnit(rule, 'graph', () => rule.evaluate(graph)));
      continue;
    }

    for (const relationship of graph.relationships) {
      const source = graph.sourceOf(relationship);
      const target = graph.require(relationship.targetGuid);
      violations.push(
        ...runUnit(rule, describeEdge(relationship), () =>
          rule.evaluate({ relationship, source, target, graph })
        )
      );
    }
  }

  return render(violations, mode);
}

/**
 * Build a graph from raw records and compile it
 *
 * @throws StructuralError before any rule runs
 * @throws RuleEvaluationError when a rule misbehaves
 */
export function compileRecords(
  records: readonly FeatureRecord[],
  registry: RuleRegistry = createDefaultRegistry(),
  options: CompileOptions = {}
): CompiledGraph {
  const { mode = 'LENIENT', ...buildOptions } = options;
  const graph = FeatureGraph.build(records, buildOptions);
  return { graph, result: compile(graph, registry, mode) };
}
