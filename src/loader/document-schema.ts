/**
 * Feature Document Schema
 *
 * Shape of the on-disk document (snake_case keys, relationship targets
 * under `guid`). The envelope is checked first so the version can be
 * rejected before the feature list is looked at.
 */

import { z } from 'zod';

export const documentEnvelopeSchema = z.object({
  // Quote numeric-looking versions: `1.0` would read back as the number 1
  version: z.string({ invalid_type_error: 'version must be a string' }),
});

export const relationshipEntrySchema = z.object({
  guid: z.number().int().safe(),
  rel: z.enum(['alternative', 'incompatible', 'complex']),
});

export const featureEntrySchema = z.object({
  guid: z.number().int().safe(),
  name: z.string().min(1, 'name must not be empty'),
  binding_time: z.enum(['compilation', 'initialization', 'runtime']),
  // YAML reads an empty `rationale:` as null
  rationale: z
    .string()
    .nullish()
    .transform((v) => v ?? ''),
  is_mandatory: z.boolean(),
  relationships: z
    .array(relationshipEntrySchema)
    .nullish()
    .transform((v) => v ?? []),
});

export const featureDocumentSchema = documentEnvelopeSchema.extend({
  features: z.array(featureEntrySchema),
});

export type FeatureEntry = z.output<typeof featureEntrySchema>;
export type FeatureDocument = z.output<typeof featureDocumentSchema>;
