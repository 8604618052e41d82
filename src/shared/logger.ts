/**
 * Feature Graph Logger
 *
 * Centralized logging for document loading and CLI runs.
 * The compiler itself never logs.
 */

import * as fs from 'fs';
import { LOG_PATH, SUPPRESS_TEST_LOGS, LOG_LEVEL } from './config.js';

/**
 * Log levels
 */
export enum CompilerLogLevel {
  INFO = 'INFO',
  DEBUG = 'DEBUG',
  ERROR = 'ERROR',
}

/**
 * Logger utility
 */
export class CompilerLogger {
  private static enabled = true;

  /**
   * Log a message with timestamp and category
   */
  private static log(level: CompilerLogLevel, message: string): void {
    if (!this.enabled) return;

    const timestamp = new Date().toISOString().split('T')[1].split('.')[0];
    const logMsg = `[${timestamp}] [FeatureGraph:${level}] ${message}`;

    fs.appendFileSync(LOG_PATH, logMsg + '\n');
  }

  /**
   * Log a parsed document
   */
  static documentLoaded(source: string, version: string, featureCount: number): void {
    this.info(`📄 Loaded ${source} (version ${version}, ${featureCount} features)`);
  }

  /**
   * Log a finished compilation
   */
  static compilationFinished(
    source: string,
    isValid: boolean,
    errorCount: number,
    warningCount: number,
    mode: string
  ): void {
    const status = isValid ? '✅ VALID' : '❌ INVALID';
    this.info(`${status} ${source}: ${errorCount} errors, ${warningCount} warnings (${mode})`);
  }

  /**
   * Log a graph that could not be built
   */
  static structuralFailure(source: string, kind: string, guids: readonly number[]): void {
    this.log(CompilerLogLevel.ERROR, `🧱 STRUCTURAL ${kind} in ${source} guids=[${guids.join(', ')}]`);
  }

  /**
   * Log a rule that threw or returned garbage
   */
  static engineDefect(ruleId: string, error: Error): void {
    this.log(CompilerLogLevel.ERROR, `💥 RULE DEFECT [${ruleId}] ${error.message}`);
  }

  /**
   * Log error
   */
  static error(message: string, error?: Error): void {
    this.log(CompilerLogLevel.ERROR, `⚠️ ${message}`);
    if (error) {
      this.log(CompilerLogLevel.ERROR, `   ${error.message}`);
    }
  }

  /**
   * Log info message
   */
  static info(message: string): void {
    if (SUPPRESS_TEST_LOGS) return;
    this.log(CompilerLogLevel.INFO, message);
  }

  /**
   * Log debug message
   */
  static debug(message: string): void {
    if (LOG_LEVEL !== 'DEBUG') return;
    this.log(CompilerLogLevel.DEBUG, message);
  }

  /**
   * Enable/disable logging
   */
  static setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }
}
