/**
 * Document Loader Error Types
 */

/**
 * Thrown when the document text cannot be parsed or is empty
 */
export class MalformedDocumentError extends Error {
  constructor(
    public readonly source: string,
    public readonly reason: string
  ) {
    super(`Malformed feature document ${source}: ${reason}`);
    this.name = 'MalformedDocumentError';
  }
}

/**
 * Thrown when the parsed document does not match the document schema
 */
export class DocumentSchemaError extends Error {
  constructor(
    public readonly source: string,
    public readonly issues: readonly string[]
  ) {
    super(`Invalid feature document ${source}:\n  ${issues.join('\n  ')}`);
    this.name = 'DocumentSchemaError';
  }
}

/**
 * Thrown when the document declares a version the loader does not accept
 */
export class UnsupportedVersionError extends Error {
  constructor(
    public readonly source: string,
    public readonly version: string,
    public readonly supported: readonly string[]
  ) {
    super(`Unsupported document version '${version}' in ${source} (supported: ${supported.join(', ')})`);
    this.name = 'UnsupportedVersionError';
  }
}
