/**
 * Feature Graph - Immutable Graph Model
 *
 * Built once per compilation from raw records:
 * - Features held in declaration order, indexed by guid (O(1) lookup)
 * - Relationships resolved at build time into (source, target, kind) triples
 * - Adjacency indexes for outgoing/incoming edges and per-pair kinds
 *
 * Construction enforces the structural invariants and throws
 * StructuralError on the first defect found in input order.
 */

import type {
  Feature,
  FeatureRecord,
  Relationship,
  RelationshipKind,
} from '../shared/types/feature.js';
import { StructuralError, UnknownFeatureError } from './errors.js';

/**
 * Options for graph construction
 */
export interface BuildOptions {
  /**
   * Keep features that repeat a guid instead of failing (partial analysis).
   * Lookup then resolves to the first declaration.
   */
  tolerateDuplicateGuids?: boolean;
}

export type BuildResult =
  | { ok: true; graph: FeatureGraph }
  | { ok: false; error: StructuralError };

const EMPTY_KINDS: ReadonlySet<RelationshipKind> = new Set();
const EMPTY_RELATIONSHIPS: readonly Relationship[] = [];

function pairKey(source: number, target: number): string {
  return `${source}|${target}`;
}

/**
 * Feature Graph - read-only view over features and relationships
 */
export class FeatureGraph {
  private readonly byGuid = new Map<number, Feature>();
  private readonly outgoingIndex = new Map<number, Relationship[]>();
  private readonly incomingIndex = new Map<number, Relationship[]>();
  private readonly kindIndex = new Map<string, Set<RelationshipKind>>();
  private readonly declaredBy = new Map<Relationship, Feature>();
  private readonly ordered: readonly Relationship[];

  private constructor(private readonly declared: readonly Feature[]) {
    for (const feature of declared) {
      if (!this.byGuid.has(feature.guid)) {
        this.byGuid.set(feature.guid, feature);
      }
      for (const rel of feature.relationships) {
        this.declaredBy.set(rel, feature);
      }
    }

    // Guid-then-declaration order; sort is stable so repeated guids keep input order
    const byGuidOrder = [...declared].sort((a, b) => a.guid - b.guid);
    this.ordered = Object.freeze(byGuidOrder.flatMap((f) => f.relationships));

    for (const rel of this.ordered) {
      const out = this.outgoingIndex.get(rel.sourceGuid) ?? [];
      out.push(rel);
      this.outgoingIndex.set(rel.sourceGuid, out);

      const inc = this.incomingIndex.get(rel.targetGuid) ?? [];
      inc.push(rel);
      this.incomingIndex.set(rel.targetGuid, inc);

      const key = pairKey(rel.sourceGuid, rel.targetGuid);
      const kinds = this.kindIndex.get(key) ?? new Set<RelationshipKind>();
      kinds.add(rel.rel);
      this.kindIndex.set(key, kinds);
    }
  }

  /**
   * Build a graph from raw records
   *
   * @throws StructuralError on the first structural defect in input order
   */
  static build(records: readonly FeatureRecord[], options: BuildOptions = {}): FeatureGraph {
    const known = new Set(records.map((r) => r.guid));
    const firstDeclared = new Map<number, FeatureRecord>();
    const declaredTriples = new Set<string>();
    const features: Feature[] = [];

    for (const record of records) {
      const first = firstDeclared.get(record.guid);
      if (first) {
        if (!options.tolerateDuplicateGuids) {
          throw StructuralError.duplicateGuid(record.guid, first.name, record.name);
        }
      } else {
        firstDeclared.set(record.guid, record);
      }

      const relationships: Relationship[] = [];
      record.relationships.forEach((declared, index) => {
        const { targetGuid, rel } = declared;

        if (targetGuid === record.guid) {
          throw StructuralError.selfRelationship(record.guid, rel);
        }
        if (!known.has(targetGuid)) {
          throw StructuralError.danglingReference(record.guid, targetGuid, rel);
        }

        const triple = `${pairKey(record.guid, targetGuid)}|${rel}`;
        if (declaredTriples.has(triple)) {
          throw StructuralError.duplicateRelationshipKind(record.guid, targetGuid, rel);
        }
        declaredTriples.add(triple);

        relationships.push(Object.freeze({ sourceGuid: record.guid, targetGuid, rel, index }));
      });

      features.push(
        Object.freeze({
          guid: record.guid,
          name: record.name,
          rationale: record.rationale,
          bindingTime: record.bindingTime,
          isMandatory: record.isMandatory,
          relationships: Object.freeze(relationships),
        })
      );
    }

    return new FeatureGraph(Object.freeze(features));
  }

  /**
   * Number of declared features (repeated guids counted when tolerated)
   */
  get size(): number {
    return this.declared.length;
  }

  /**
   * Features in declaration order
   */
  get features(): readonly Feature[] {
    return this.declared;
  }

  /**
   * All relationships, ordered by source guid then declaration order
   */
  get relationships(): readonly Relationship[] {
    return this.ordered;
  }

  has(guid: number): boolean {
    return this.byGuid.has(guid);
  }

  get(guid: number): Feature | undefined {
    return this.byGuid.get(guid);
  }

  /**
   * @throws UnknownFeatureError if no feature carries the guid
   */
  require(guid: number): Feature {
    const feature = this.byGuid.get(guid);
    if (!feature) {
      throw new UnknownFeatureError(guid);
    }
    return feature;
  }

  /**
   * Feature that declared the relationship. With tolerated duplicate guids
   * this can differ from get(relationship.sourceGuid).
   *
   * @throws UnknownFeatureError if the relationship is not from this graph
   */
  sourceOf(relationship: Relationship): Feature {
    const feature = this.declaredBy.get(relationship);
    if (!feature) {
      throw new UnknownFeatureError(relationship.sourceGuid);
    }
    return feature;
  }

  outgoing(guid: number): readonly Relationship[] {
    return this.outgoingIndex.get(guid) ?? EMPTY_RELATIONSHIPS;
  }

  incoming(guid: number): readonly Relationship[] {
    return this.incomingIndex.get(guid) ?? EMPTY_RELATIONSHIPS;
  }

  /**
   * Kinds declared from source toward target (one direction only)
   */
  kindsBetween(source: number, target: number): ReadonlySet<RelationshipKind> {
    return this.kindIndex.get(pairKey(source, target)) ?? EMPTY_KINDS;
  }

  /**
   * Kinds declared between two features in either direction
   */
  kindsForPair(a: number, b: number): ReadonlySet<RelationshipKind> {
    const union = new Set(this.kindsBetween(a, b));
    for (const kind of this.kindsBetween(b, a)) {
      union.add(kind);
    }
    return union;
  }

  /**
   * First relationship between two features: a's own declaration wins,
   * otherwise b's declaration toward a unless ownOnly is set
   */
  relationshipBetween(a: number, b: number, ownOnly = false): Relationship | undefined {
    const own = this.outgoing(a).find((r) => r.targetGuid === b);
    if (own || ownOnly) {
      return own;
    }
    return this.outgoing(b).find((r) => r.targetGuid === a);
  }
}

/**
 * Build a graph from raw records
 *
 * @throws StructuralError
 */
export function buildGraph(records: readonly FeatureRecord[], options?: BuildOptions): FeatureGraph {
  return FeatureGraph.build(records, options);
}

/**
 * Build a graph, returning structural failures as a value
 */
export function tryBuildGraph(records: readonly FeatureRecord[], options?: BuildOptions): BuildResult {
  try {
    return { ok: true, graph: FeatureGraph.build(records, options) };
  } catch (error) {
    if (error instanceof StructuralError) {
      return { ok: false, error };
    }
    throw error;
  }
}
