/**
 * Feature Model - Type Definitions
 *
 * Features are units of software capability; relationships are directed,
 * typed edges declared by the source feature.
 */

/** Stage at which a feature is resolved into the produced software */
export type BindingTime = 'compilation' | 'initialization' | 'runtime';

/** Relationship kinds */
export type RelationshipKind =
  | 'alternative' // Either feature may be chosen
  | 'incompatible' // Features cannot be combined
  | 'complex'; // Nontrivial relationship, described in rationale

export const BINDING_TIMES: readonly BindingTime[] = ['compilation', 'initialization', 'runtime'];

export const RELATIONSHIP_KINDS: readonly RelationshipKind[] = ['alternative', 'incompatible', 'complex'];

/**
 * Relationship as declared by a raw record
 */
export interface RelationshipRecord {
  targetGuid: number;
  rel: RelationshipKind;
}

/**
 * Raw feature record as produced by the document loader
 */
export interface FeatureRecord {
  guid: number;
  name: string;
  rationale: string;
  bindingTime: BindingTime;
  isMandatory: boolean;
  relationships: RelationshipRecord[];
}

/**
 * Feature node held by the graph (read-only once built)
 */
export interface Feature {
  readonly guid: number;
  readonly name: string;
  readonly rationale: string;
  readonly bindingTime: BindingTime;
  readonly isMandatory: boolean;
  readonly relationships: readonly Relationship[];
}

/**
 * Resolved relationship: a (source, target, kind) triple plus its position
 * in the source feature's declaration list
 */
export interface Relationship {
  readonly sourceGuid: number;
  readonly targetGuid: number;
  readonly rel: RelationshipKind;
  readonly index: number;
}
