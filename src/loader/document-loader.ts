/**
 * Feature Document Loader
 *
 * Reads YAML (or JSON, which YAML accepts) feature documents and produces
 * the raw records the compiler consumes. Also writes records back out in
 * the same document shape.
 */

import * as fs from 'fs/promises';
import { parse, stringify } from 'yaml';
import type { ZodIssue } from 'zod';
import { SUPPORTED_SCHEMA_VERSIONS } from '../shared/config.js';
import { CompilerLogger } from '../shared/logger.js';
import type { FeatureRecord } from '../shared/types/feature.js';
import { documentEnvelopeSchema, featureDocumentSchema, type FeatureEntry } from './document-schema.js';
import { DocumentSchemaError, MalformedDocumentError, UnsupportedVersionError } from './errors.js';

/** Version written by serializeFeatureDocument when none is given */
export const CURRENT_DOCUMENT_VERSION = '0.1.0';

/**
 * Parsed document ready for compilation
 */
export interface LoadedDocument {
  source: string;
  version: string;
  records: FeatureRecord[];
}

function formatIssue(issue: ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
  return `${location}: ${issue.message}`;
}

function toRecord(entry: FeatureEntry): FeatureRecord {
  return {
    guid: entry.guid,
    name: entry.name,
    rationale: entry.rationale,
    bindingTime: entry.binding_time,
    isMandatory: entry.is_mandatory,
    relationships: entry.relationships.map((r) => ({ targetGuid: r.guid, rel: r.rel })),
  };
}

/**
 * Parse document text into raw feature records
 *
 * @param text - YAML or JSON document
 * @param source - Name used in error messages (usually the file path)
 * @param supportedVersions - Accepted document versions
 * @throws MalformedDocumentError, UnsupportedVersionError, DocumentSchemaError
 */
export function parseFeatureDocument(
  text: string,
  source = '<inline>',
  supportedVersions: readonly string[] = SUPPORTED_SCHEMA_VERSIONS
): LoadedDocument {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    throw new MalformedDocumentError(source, error instanceof Error ? error.message : String(error));
  }

  if (raw === null || raw === undefined) {
    throw new MalformedDocumentError(source, 'document is empty');
  }

  const envelope = documentEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    throw new DocumentSchemaError(source, envelope.error.issues.map(formatIssue));
  }
  if (!supportedVersions.includes(envelope.data.version)) {
    throw new UnsupportedVersionError(source, envelope.data.version, supportedVersions);
  }

  const document = featureDocumentSchema.safeParse(raw);
  if (!document.success) {
    throw new DocumentSchemaError(source, document.error.issues.map(formatIssue));
  }

  return {
    source,
    version: document.data.version,
    records: document.data.features.map(toRecord),
  };
}

/**
 * Read and parse a feature document from disk
 *
 * @example
 * const { records } = await loadFeatureDocument('features.yaml');
 * const { result } = compileRecords(records);
 */
export async function loadFeatureDocument(
  filePath: string,
  supportedVersions?: readonly string[]
): Promise<LoadedDocument> {
  CompilerLogger.debug(`Reading feature document ${filePath}`);
  const text = await fs.readFile(filePath, 'utf-8');
  const document = parseFeatureDocument(text, filePath, supportedVersions);
  CompilerLogger.documentLoaded(filePath, document.version, document.records.length);
  return document;
}

/**
 * Serialize records to YAML in the document shape read by parseFeatureDocument
 */
export function serializeFeatureDocument(
  records: readonly FeatureRecord[],
  version: string = CURRENT_DOCUMENT_VERSION
): string {
  return stringify({
    version,
    features: records.map((r) => ({
      guid: r.guid,
      name: r.name,
      binding_time: r.bindingTime,
      rationale: r.rationale,
      is_mandatory: r.isMandatory,
      relationships: r.relationships.map((rel) => ({ guid: rel.targetGuid, rel: rel.rel })),
    })),
  });
}
