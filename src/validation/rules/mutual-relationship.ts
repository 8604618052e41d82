/**
 * mutual-relationship (opt-in)
 *
 * Flags pairs where both features declare a relationship toward the other.
 * Not pre-registered: a one-sided declaration is authoritative for the pair,
 * so mirrored declarations are legal by default.
 */

import type { EdgeRule } from '../types.js';
import { byGuid, describeFeature } from './format.js';

export const mutualRelationshipRule: EdgeRule = {
  id: 'mutual-relationship',
  description: 'Only one feature of a pair should declare their relationship',
  severity: 'WARNING',
  scope: 'EDGE',
  evaluate({ source, target, graph }) {
    if (!graph.relationshipBetween(target.guid, source.guid, true)) {
      return [];
    }

    const [low, high] = byGuid(source, target);
    const lowKinds = [...graph.kindsBetween(low.guid, high.guid)].sort().join('/');
    const highKinds = [...graph.kindsBetween(high.guid, low.guid)].sort().join('/');
    return [
      {
        guids: [low.guid, high.guid],
        message:
          `Features ${describeFeature(low)} and ${describeFeature(high)} both declare the relationship: ` +
          `${low.name} has ${lowKinds}, ${high.name} has ${highKinds}`,
      },
    ];
  },
};
