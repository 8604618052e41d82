/**
 * Record builders shared by unit and integration tests
 */

import type {
  FeatureRecord,
  RelationshipKind,
  RelationshipRecord,
} from '../../src/shared/types/feature.js';
import type { FeatureGraph } from '../../src/graph-engine/feature-graph.js';
import type { EdgeContext } from '../../src/validation/types.js';

/**
 * Optional, compile-time feature named after its guid
 */
export function feature(guid: number, overrides: Partial<FeatureRecord> = {}): FeatureRecord {
  return {
    guid,
    name: `Feature ${guid}`,
    rationale: '',
    bindingTime: 'compilation',
    isMandatory: false,
    relationships: [],
    ...overrides,
  };
}

export function rel(targetGuid: number, kind: RelationshipKind): RelationshipRecord {
  return { targetGuid, rel: kind };
}

/**
 * EDGE rule input for the n-th relationship of a graph
 */
export function edgeContext(graph: FeatureGraph, index: number): EdgeContext {
  const relationship = graph.relationships[index];
  return {
    relationship,
    source: graph.sourceOf(relationship),
    target: graph.require(relationship.targetGuid),
    graph,
  };
}

/**
 * Document used by loader, CLI and integration tests
 */
export const SAMPLE_DOCUMENT = `version: 0.1.0
features:
  - guid: 0
    name: Logging
    binding_time: compilation
    rationale: Always on
    is_mandatory: true
    relationships:
      - guid: 1
        rel: incompatible
  - guid: 1
    name: Silent mode
    binding_time: runtime
    rationale:
    is_mandatory: true
    relationships: []
`;
