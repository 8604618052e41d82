/**
 * monotonic-guid
 *
 * Guids should grow strictly in declaration order.
 */

import type { GraphRule, RuleFinding } from '../types.js';
import { describeFeature } from './format.js';

export const monotonicGuidRule: GraphRule = {
  id: 'monotonic-guid',
  description: 'Feature guids must increase strictly in declaration order',
  severity: 'WARNING',
  scope: 'GRAPH',
  evaluate(graph) {
    const findings: RuleFinding[] = [];
    const features = graph.features;

    for (let i = 1; i < features.length; i++) {
      const previous = features[i - 1];
      const current = features[i];
      if (current.guid <= previous.guid) {
        findings.push({
          guids: [previous.guid, current.guid],
          message: `Feature ${describeFeature(current)} is declared after ${describeFeature(previous)}; guids must increase`,
        });
      }
    }
    return findings;
  },
};
