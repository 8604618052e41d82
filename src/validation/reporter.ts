/**
 * Diagnostics Reporter
 *
 * Turns a raw violation list into a CompilationResult:
 * 1. Normalise guid sets (ascending, unique)
 * 2. Drop structurally identical violations (rule id, guids, message)
 * 3. Order by severity desc, rule id, guids, message
 *
 * Output depends only on the set of violations, never on evaluation order.
 */

import type { CompilationMode, CompilationResult, RuleSeverity, Violation } from './types.js';

const SEVERITY_RANK: Record<RuleSeverity, number> = {
  ERROR: 2,
  WARNING: 1,
};

function normaliseGuids(guids: readonly number[]): number[] {
  return [...new Set(guids)].sort((a, b) => a - b);
}

function violationKey(v: Violation): string {
  return `${v.ruleId}\u0000${v.guids.join(',')}\u0000${v.message}`;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareGuids(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return a.length - b.length;
}

/**
 * Total order used for diagnostics output
 */
export function compareViolations(a: Violation, b: Violation): number {
  return (
    SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
    compareText(a.ruleId, b.ruleId) ||
    compareGuids(a.guids, b.guids) ||
    compareText(a.message, b.message)
  );
}

/**
 * Render violations into a compilation result
 */
export function render(violations: readonly Violation[], mode: CompilationMode = 'LENIENT'): CompilationResult {
  const unique = new Map<string, Violation>();

  for (const violation of violations) {
    const normalised: Violation = { ...violation, guids: normaliseGuids(violation.guids) };
    const key = violationKey(normalised);
    if (!unique.has(key)) {
      unique.set(key, normalised);
    }
  }

  const ordered = [...unique.values()].sort(compareViolations);
  const errorCount = ordered.filter((v) => v.severity === 'ERROR').length;
  const warningCount = ordered.filter((v) => v.severity === 'WARNING').length;
  const isValid = errorCount === 0 && (mode === 'LENIENT' || warningCount === 0);

  return {
    isValid,
    mode,
    violations: ordered,
    errorCount,
    warningCount,
  };
}

/**
 * One diagnostic line: severity, rule id, offending guids, message
 */
export function formatViolation(violation: Violation): string {
  return `${violation.severity} ${violation.ruleId} [${violation.guids.join(', ')}] ${violation.message}`;
}

/**
 * Violation lines followed by a summary line
 */
export function formatResult(result: CompilationResult): string {
  const lines = result.violations.map(formatViolation);
  const status = result.isValid ? 'VALID' : 'INVALID';
  lines.push(
    `${status} (${result.errorCount} errors, ${result.warningCount} warnings, ${result.mode.toLowerCase()})`
  );
  return lines.join('\n');
}
