/**
 * Configuration - Unit Tests
 *
 * Values are read at import time, so each case stubs the environment and
 * imports a fresh copy of the module.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';

async function loadConfig() {
  vi.resetModules();
  return import('../../../src/shared/config.js');
}

describe('config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should default to lenient mode and version 0.1.0', async () => {
    vi.stubEnv('FEATURE_GRAPH_MODE', '');
    vi.stubEnv('FEATURE_GRAPH_SCHEMA_VERSIONS', '');

    const config = await loadConfig();

    expect(config.DEFAULT_COMPILE_MODE).toBe('LENIENT');
    expect(config.SUPPORTED_SCHEMA_VERSIONS).toEqual(['0.1.0']);
  });

  it('should read strict mode case-insensitively', async () => {
    vi.stubEnv('FEATURE_GRAPH_MODE', 'Strict');

    const config = await loadConfig();

    expect(config.DEFAULT_COMPILE_MODE).toBe('STRICT');
  });

  it('should split and trim the supported versions list', async () => {
    vi.stubEnv('FEATURE_GRAPH_SCHEMA_VERSIONS', '0.1.0, 0.2.0,');

    const config = await loadConfig();

    expect(config.SUPPORTED_SCHEMA_VERSIONS).toEqual(['0.1.0', '0.2.0']);
  });

  it('should report invalid settings', async () => {
    vi.stubEnv('FEATURE_GRAPH_MODE', 'loud');
    vi.stubEnv('LOG_LEVEL', 'trace');
    vi.stubEnv('FEATURE_GRAPH_SCHEMA_VERSIONS', ' , ');

    const config = await loadConfig();

    expect(config.DEFAULT_COMPILE_MODE).toBe('LENIENT');
    expect(config.validateConfig()).toEqual({
      valid: false,
      errors: [
        "LOG_LEVEL must be 'INFO' or 'DEBUG', got 'TRACE'",
        "FEATURE_GRAPH_MODE must be 'strict' or 'lenient', got 'loud'",
        'FEATURE_GRAPH_SCHEMA_VERSIONS must name at least one version',
      ],
    });
  });

  it('should accept the defaults', async () => {
    vi.stubEnv('FEATURE_GRAPH_MODE', '');
    vi.stubEnv('LOG_LEVEL', '');
    vi.stubEnv('FEATURE_GRAPH_SCHEMA_VERSIONS', '');

    const config = await loadConfig();

    expect(config.validateConfig()).toEqual({ valid: true, errors: [] });
  });
});
