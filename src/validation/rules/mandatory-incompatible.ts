/**
 * mandatory-incompatible
 *
 * Two mandatory features can never be mutually exclusive.
 */

import type { EdgeRule } from '../types.js';
import { byGuid, describeFeature } from './format.js';

export const mandatoryIncompatibleRule: EdgeRule = {
  id: 'mandatory-incompatible',
  description: 'Mandatory features cannot be incompatible with each other',
  severity: 'ERROR',
  scope: 'EDGE',
  evaluate({ relationship, source, target }) {
    if (relationship.rel !== 'incompatible' || !source.isMandatory || !target.isMandatory) {
      return [];
    }

    const [low, high] = byGuid(source, target);
    return [
      {
        guids: [low.guid, high.guid],
        message: `Mandatory features ${describeFeature(low)} and ${describeFeature(high)} cannot be mutually exclusive`,
      },
    ];
  },
};
