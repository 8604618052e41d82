#!/usr/bin/env node
/**
 * Feature Graph CLI
 *
 * Usage: feature-graph compile <file> [--strict | --mode strict|lenient]
 *
 * Exit status: 0 valid, 1 invalid, 2 unreadable document or structural
 * error, 3 rule defect, 64 bad usage.
 */

import { readFileSync, realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { z } from 'zod';
import { DEFAULT_COMPILE_MODE, validateConfig } from '../shared/config.js';
import { CompilerLogger } from '../shared/logger.js';
import { StructuralError } from '../graph-engine/errors.js';
import { loadFeatureDocument } from '../loader/document-loader.js';
import { DocumentSchemaError, MalformedDocumentError, UnsupportedVersionError } from '../loader/errors.js';
import { compileRecords } from '../validation/compiler.js';
import { RuleEvaluationError } from '../validation/errors.js';
import { formatResult } from '../validation/reporter.js';
import { createDefaultRegistry } from '../validation/rule-registry.js';
import type { CompilationMode } from '../validation/types.js';

export const EXIT_CODES = {
  VALID: 0,
  INVALID: 1,
  INPUT_ERROR: 2,
  ENGINE_DEFECT: 3,
  USAGE: 64,
} as const;

export const USAGE = [
  'Usage: feature-graph compile <file> [--strict | --mode strict|lenient]',
  '       feature-graph --help | --version',
].join('\n');

/**
 * Output sinks (injected so tests can capture lines)
 */
export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export type ParsedArgs =
  | { command: 'help' }
  | { command: 'version' }
  | { command: 'compile'; file: string; mode: CompilationMode }
  | { command: 'error'; message: string };

const consoleIO: CliIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

/**
 * Parse command line arguments (without node and script path)
 */
export function parseArgs(argv: readonly string[], defaultMode: CompilationMode = DEFAULT_COMPILE_MODE): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { command: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { command: 'version' };
  }

  const [command, ...rest] = argv;
  if (command !== 'compile') {
    return { command: 'error', message: command ? `Unknown command '${command}'` : 'Missing command' };
  }

  let mode = defaultMode;
  const positional: string[] = [];

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === '--strict') {
      mode = 'STRICT';
    } else if (arg === '--lenient') {
      mode = 'LENIENT';
    } else if (arg === '--mode') {
      const value = rest[i + 1]?.toLowerCase();
      if (value !== 'strict' && value !== 'lenient') {
        return { command: 'error', message: `--mode expects 'strict' or 'lenient'` };
      }
      mode = value === 'strict' ? 'STRICT' : 'LENIENT';
      i++;
    } else if (arg.startsWith('-')) {
      return { command: 'error', message: `Unknown option '${arg}'` };
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 1) {
    return { command: 'error', message: 'compile expects exactly one document path' };
  }

  return { command: 'compile', file: positional[0], mode };
}

function readPackageVersion(): string {
  const packageUrl = new URL('../../package.json', import.meta.url);
  const manifest = z.object({ version: z.string() }).parse(JSON.parse(readFileSync(packageUrl, 'utf-8')));
  return manifest.version;
}

function isInputError(error: unknown): error is Error {
  return (
    error instanceof StructuralError ||
    error instanceof MalformedDocumentError ||
    error instanceof DocumentSchemaError ||
    error instanceof UnsupportedVersionError ||
    (error instanceof Error && 'code' in error && typeof error.code === 'string')
  );
}

/**
 * Compile one document and report diagnostics
 */
async function runCompile(file: string, mode: CompilationMode, io: CliIO): Promise<number> {
  try {
    const document = await loadFeatureDocument(file);
    const { result } = compileRecords(document.records, createDefaultRegistry(), { mode });

    io.stdout(formatResult(result));
    CompilerLogger.compilationFinished(file, result.isValid, result.errorCount, result.warningCount, mode);

    return result.isValid ? EXIT_CODES.VALID : EXIT_CODES.INVALID;
  } catch (error) {
    if (error instanceof StructuralError) {
      CompilerLogger.structuralFailure(file, error.kind, error.guids);
      io.stderr(`error: ${error.kind}: ${error.message}`);
      return EXIT_CODES.INPUT_ERROR;
    }
    if (error instanceof RuleEvaluationError) {
      CompilerLogger.engineDefect(error.ruleId, error);
      io.stderr(`internal error: ${error.message}`);
      return EXIT_CODES.ENGINE_DEFECT;
    }
    if (isInputError(error)) {
      io.stderr(`error: ${error.message}`);
      return EXIT_CODES.INPUT_ERROR;
    }
    throw error;
  }
}

/**
 * Run the CLI and return the exit status
 */
export async function runCli(argv: readonly string[], io: CliIO = consoleIO): Promise<number> {
  const args = parseArgs(argv);

  switch (args.command) {
    case 'help':
      io.stdout(USAGE);
      return EXIT_CODES.VALID;
    case 'version':
      io.stdout(`feature-graph ${readPackageVersion()}`);
      return EXIT_CODES.VALID;
    case 'error':
      io.stderr(`error: ${args.message}\n${USAGE}`);
      return EXIT_CODES.USAGE;
    case 'compile': {
      for (const problem of validateConfig().errors) {
        io.stderr(`warning: ${problem}`);
      }
      return runCompile(args.file, args.mode, io);
    }
  }
}

function isEntryPoint(): boolean {
  const invokedPath = process.argv[1];
  if (!invokedPath) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(invokedPath)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      CompilerLogger.error('Unexpected failure', error instanceof Error ? error : undefined);
      console.error(error);
      process.exitCode = 70;
    }
  );
}
