/**
 * Graph Model Error Types
 *
 * Structural errors are fatal: a graph that fails them cannot be handed to
 * rules that assume referential integrity.
 */

import type { RelationshipKind } from '../shared/types/feature.js';

export type StructuralErrorKind =
  | 'DuplicateGuid'
  | 'DanglingReference'
  | 'SelfRelationship'
  | 'DuplicateRelationshipKind';

/**
 * Thrown when raw records violate a structural invariant
 */
export class StructuralError extends Error {
  constructor(
    public readonly kind: StructuralErrorKind,
    public readonly guids: readonly number[],
    message: string,
    public readonly rel?: RelationshipKind
  ) {
    super(message);
    this.name = 'StructuralError';
  }

  static duplicateGuid(guid: number, firstName: string, secondName: string): StructuralError {
    return new StructuralError(
      'DuplicateGuid',
      [guid],
      `Duplicate guid ${guid}: declared by '${firstName}' and '${secondName}'`
    );
  }

  static danglingReference(sourceGuid: number, targetGuid: number, rel: RelationshipKind): StructuralError {
    return new StructuralError(
      'DanglingReference',
      [sourceGuid, targetGuid],
      `Feature ${sourceGuid} declares ${rel} relationship to unknown guid ${targetGuid}`,
      rel
    );
  }

  static selfRelationship(guid: number, rel: RelationshipKind): StructuralError {
    return new StructuralError(
      'SelfRelationship',
      [guid],
      `Feature ${guid} declares ${rel} relationship to itself`,
      rel
    );
  }

  static duplicateRelationshipKind(
    sourceGuid: number,
    targetGuid: number,
    rel: RelationshipKind
  ): StructuralError {
    return new StructuralError(
      'DuplicateRelationshipKind',
      [sourceGuid, targetGuid],
      `Feature ${sourceGuid} declares ${rel} relationship to ${targetGuid} more than once`,
      rel
    );
  }
}

/**
 * Thrown when a feature is looked up by a guid the graph does not hold
 */
export class UnknownFeatureError extends Error {
  constructor(public readonly guid: number) {
    super(`No feature with guid ${guid}`);
    this.name = 'UnknownFeatureError';
  }
}
