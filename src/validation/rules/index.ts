/**
 * Built-in Rules
 */

import type { Rule } from '../types.js';
import { noDuplicateGuidRule } from './no-duplicate-guid.js';
import { mandatoryIncompatibleRule } from './mandatory-incompatible.js';
import { monotonicGuidRule } from './monotonic-guid.js';
import { conflictingRelationshipKindsRule } from './conflicting-relationship-kinds.js';
import { mutualRelationshipRule } from './mutual-relationship.js';

/** Pre-registered in every default registry, in this order */
export const BUILTIN_RULES: readonly Rule[] = [
  noDuplicateGuidRule,
  mandatoryIncompatibleRule,
  monotonicGuidRule,
  conflictingRelationshipKindsRule,
];

/** Shipped but registered only on request */
export const OPTIONAL_RULES: readonly Rule[] = [mutualRelationshipRule];

export {
  noDuplicateGuidRule,
  mandatoryIncompatibleRule,
  monotonicGuidRule,
  conflictingRelationshipKindsRule,
  mutualRelationshipRule,
};
