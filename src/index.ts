/**
 * Feature Graph - public API
 *
 * Usage:
 *   const graph = buildGraph(records);
 *   const result = compile(graph, createDefaultRegistry(), 'STRICT');
 */

export type {
  BindingTime,
  RelationshipKind,
  RelationshipRecord,
  FeatureRecord,
  Feature,
  Relationship,
} from './shared/types/feature.js';
export { BINDING_TIMES, RELATIONSHIP_KINDS } from './shared/types/feature.js';

export {
  FeatureGraph,
  buildGraph,
  tryBuildGraph,
  type BuildOptions,
  type BuildResult,
} from './graph-engine/feature-graph.js';
export {
  toGraphElements,
  type GraphElements,
  type GraphNodeElement,
  type GraphEdgeElement,
} from './graph-engine/graph-elements.js';
export { StructuralError, UnknownFeatureError, type StructuralErrorKind } from './graph-engine/errors.js';

export * from './validation/index.js';
export * from './loader/index.js';
