/**
 * Centralized Configuration
 *
 * All configuration values loaded from environment variables with defaults.
 * Only the loader and CLI read these; the compiler takes everything it
 * needs as arguments.
 */

import * as path from 'path';
import { config as loadDotenv } from 'dotenv';

// Load .env file
loadDotenv();

/**
 * Logging
 * Use /tmp explicitly so the CLI can be run from read-only checkouts
 */
const TMP_DIR = process.env.TMP_DIR || '/tmp';
export const LOG_PATH = process.env.LOG_PATH || path.join(TMP_DIR, 'feature-graph.log');
export const LOG_LEVEL = (process.env.LOG_LEVEL || 'INFO').toUpperCase();
export const SUPPRESS_TEST_LOGS = process.env.VITEST === 'true' || process.env.NODE_ENV === 'test';

/**
 * Compilation
 */
export const DEFAULT_COMPILE_MODE_NAME = (process.env.FEATURE_GRAPH_MODE || 'lenient').toLowerCase();
export const DEFAULT_COMPILE_MODE: 'STRICT' | 'LENIENT' =
  DEFAULT_COMPILE_MODE_NAME === 'strict' ? 'STRICT' : 'LENIENT';

/**
 * Document versions accepted by the loader
 */
export const SUPPORTED_SCHEMA_VERSIONS: readonly string[] = (
  process.env.FEATURE_GRAPH_SCHEMA_VERSIONS || '0.1.0'
)
  .split(',')
  .map((v) => v.trim())
  .filter((v) => v.length > 0);

/**
 * Validate environment-derived settings
 */
export function validateConfig(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!['INFO', 'DEBUG'].includes(LOG_LEVEL)) {
    errors.push(`LOG_LEVEL must be 'INFO' or 'DEBUG', got '${LOG_LEVEL}'`);
  }

  if (!['strict', 'lenient'].includes(DEFAULT_COMPILE_MODE_NAME)) {
    errors.push(`FEATURE_GRAPH_MODE must be 'strict' or 'lenient', got '${DEFAULT_COMPILE_MODE_NAME}'`);
  }

  if (SUPPORTED_SCHEMA_VERSIONS.length === 0) {
    errors.push('FEATURE_GRAPH_SCHEMA_VERSIONS must name at least one version');
  }

  return {
    valid: errors.length === 0,
    errors
  };
}
