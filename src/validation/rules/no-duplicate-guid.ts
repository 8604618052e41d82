/**
 * no-duplicate-guid
 *
 * Safety net over the structural duplicate check; only fires on graphs
 * built with tolerateDuplicateGuids.
 */

import type { GraphRule, RuleFinding } from '../types.js';

export const noDuplicateGuidRule: GraphRule = {
  id: 'no-duplicate-guid',
  description: 'Every feature guid must be unique',
  severity: 'ERROR',
  scope: 'GRAPH',
  evaluate(graph) {
    const namesByGuid = new Map<number, string[]>();
    for (const feature of graph.features) {
      const names = namesByGuid.get(feature.guid) ?? [];
      names.push(feature.name);
      namesByGuid.set(feature.guid, names);
    }

    const findings: RuleFinding[] = [];
    for (const [guid, names] of namesByGuid) {
      if (names.length > 1) {
        findings.push({
          guids: [guid],
          message: `Guid ${guid} is shared by ${names.length} features: ${names.map((n) => `'${n}'`).join(', ')}`,
        });
      }
    }
    return findings;
  },
};
