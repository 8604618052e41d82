/**
 * Graph Elements Export
 *
 * Flattens a validated graph into plain node/edge data for a rendering
 * layer. Ids are strings since most graph renderers key elements that way.
 */

import type { BindingTime, RelationshipKind } from '../shared/types/feature.js';
import type { FeatureGraph } from './feature-graph.js';

export interface GraphNodeElement {
  id: string;
  label: string;
  guid: number;
  rationale: string;
  bindingTime: BindingTime;
  isMandatory: boolean;
}

export interface GraphEdgeElement {
  id: string;
  source: string;
  target: string;
  kind: RelationshipKind;
}

export interface GraphElements {
  nodes: GraphNodeElement[];
  edges: GraphEdgeElement[];
}

/**
 * Convert a graph to node and edge elements
 *
 * Nodes keep declaration order; edges keep guid-then-declaration order.
 * Edge ids are `source->target:kind`, unique since a pair carries each kind once.
 */
export function toGraphElements(graph: FeatureGraph): GraphElements {
  const nodes = graph.features.map((f) => ({
    id: String(f.guid),
    label: f.name,
    guid: f.guid,
    rationale: f.rationale,
    bindingTime: f.bindingTime,
    isMandatory: f.isMandatory,
  }));

  const edges = graph.relationships.map((r) => ({
    id: `${r.sourceGuid}->${r.targetGuid}:${r.rel}`,
    source: String(r.sourceGuid),
    target: String(r.targetGuid),
    kind: r.rel,
  }));

  return { nodes, edges };
}
