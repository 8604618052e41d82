/**
 * Message helpers shared by built-in rules
 */

import type { Feature } from '../../shared/types/feature.js';

export function describeFeature(feature: Feature): string {
  return `'${feature.name}' (guid ${feature.guid})`;
}

/**
 * Order two endpoints by guid so pair findings read the same from either side
 */
export function byGuid(a: Feature, b: Feature): [Feature, Feature] {
  return a.guid <= b.guid ? [a, b] : [b, a];
}
