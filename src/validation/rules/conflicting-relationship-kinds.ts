/**
 * conflicting-relationship-kinds
 *
 * A pair cannot be both alternative and incompatible, whichever side
 * declares each kind.
 */

import type { EdgeRule } from '../types.js';
import { byGuid, describeFeature } from './format.js';

export const conflictingRelationshipKindsRule: EdgeRule = {
  id: 'conflicting-relationship-kinds',
  description: 'A feature pair cannot be both alternative and incompatible',
  severity: 'ERROR',
  scope: 'EDGE',
  evaluate({ relationship, source, target, graph }) {
    if (relationship.rel === 'complex') {
      return [];
    }

    const kinds = graph.kindsForPair(source.guid, target.guid);
    if (!kinds.has('alternative') || !kinds.has('incompatible')) {
      return [];
    }

    const [low, high] = byGuid(source, target);
    return [
      {
        guids: [low.guid, high.guid],
        message: `Features ${describeFeature(low)} and ${describeFeature(high)} are declared both alternative and incompatible`,
      },
    ];
  },
};
