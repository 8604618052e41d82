/**
 * Diagnostics Reporter - Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { formatResult, formatViolation, render } from '../../../src/validation/reporter.js';
import type { Violation } from '../../../src/validation/types.js';

const violation = (
  severity: Violation['severity'],
  ruleId: string,
  guids: number[],
  message = 'defect'
): Violation => ({ severity, ruleId, guids, message });

describe('render', () => {
  it('should return a valid empty result', () => {
    expect(render([])).toEqual({ isValid: true, mode: 'LENIENT', violations: [], errorCount: 0, warningCount: 0 });
  });

  it('should fold violations with the same rule, guid set and message', () => {
    const result = render([
      violation('ERROR', 'mandatory-incompatible', [1, 0]),
      violation('ERROR', 'mandatory-incompatible', [0, 1]),
      violation('ERROR', 'mandatory-incompatible', [0, 1, 1]),
    ]);

    expect(result.violations).toEqual([violation('ERROR', 'mandatory-incompatible', [0, 1])]);
    expect(result.errorCount).toBe(1);
  });

  it('should keep violations that differ in message or rule', () => {
    const result = render([
      violation('ERROR', 'rule-a', [0], 'first'),
      violation('ERROR', 'rule-a', [0], 'second'),
      violation('ERROR', 'rule-b', [0], 'first'),
    ]);

    expect(result.violations).toHaveLength(3);
  });

  it('should order by severity, rule id, then guids', () => {
    const result = render([
      violation('WARNING', 'monotonic-guid', [2, 5]),
      violation('ERROR', 'mandatory-incompatible', [3, 4]),
      violation('ERROR', 'conflicting-relationship-kinds', [1, 2]),
      violation('ERROR', 'mandatory-incompatible', [0, 1]),
    ]);

    expect(result.violations.map((v) => `${v.severity} ${v.ruleId} ${v.guids.join(',')}`)).toEqual([
      'ERROR conflicting-relationship-kinds 1,2',
      'ERROR mandatory-incompatible 0,1',
      'ERROR mandatory-incompatible 3,4',
      'WARNING monotonic-guid 2,5',
    ]);
  });

  it('should place a shorter guid list before a longer one with the same prefix', () => {
    const result = render([violation('ERROR', 'rule', [1, 2]), violation('ERROR', 'rule', [1])]);

    expect(result.violations.map((v) => v.guids)).toEqual([[1], [1, 2]]);
  });

  it('should not depend on input order', () => {
    const input = [
      violation('WARNING', 'monotonic-guid', [4, 9], 'late'),
      violation('ERROR', 'conflicting-relationship-kinds', [0, 3]),
      violation('ERROR', 'mandatory-incompatible', [0, 3]),
      violation('ERROR', 'mandatory-incompatible', [0, 3], 'another'),
    ];

    expect(render([...input].reverse())).toEqual(render(input));
  });

  it('should block on warnings only in STRICT mode', () => {
    const warnings = [violation('WARNING', 'monotonic-guid', [2, 5])];

    expect(render(warnings, 'LENIENT').isValid).toBe(true);
    expect(render(warnings, 'STRICT').isValid).toBe(false);
    expect(render(warnings, 'STRICT').warningCount).toBe(1);
  });

  it('should block on errors in both modes', () => {
    const errors = [violation('ERROR', 'mandatory-incompatible', [0, 1])];

    expect(render(errors, 'LENIENT').isValid).toBe(false);
    expect(render(errors, 'STRICT').isValid).toBe(false);
  });
});

describe('formatViolation', () => {
  it('should render severity, rule id, guids and message on one line', () => {
    expect(formatViolation(violation('ERROR', 'mandatory-incompatible', [0, 1], 'cannot both be required'))).toBe(
      'ERROR mandatory-incompatible [0, 1] cannot both be required'
    );
  });
});

describe('formatResult', () => {
  it('should append a summary line', () => {
    const result = render([violation('WARNING', 'monotonic-guid', [5, 2], 'out of order')]);

    expect(formatResult(result)).toBe(
      'WARNING monotonic-guid [2, 5] out of order\nVALID (0 errors, 1 warnings, lenient)'
    );
  });

  it('should print only the summary for a clean graph', () => {
    expect(formatResult(render([], 'STRICT'))).toBe('VALID (0 errors, 0 warnings, strict)');
  });
});
