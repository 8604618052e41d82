/**
 * Document Loader Module
 */

export {
  CURRENT_DOCUMENT_VERSION,
  parseFeatureDocument,
  loadFeatureDocument,
  serializeFeatureDocument,
  type LoadedDocument,
} from './document-loader.js';
export { featureDocumentSchema, type FeatureDocument, type FeatureEntry } from './document-schema.js';
export { MalformedDocumentError, DocumentSchemaError, UnsupportedVersionError } from './errors.js';
