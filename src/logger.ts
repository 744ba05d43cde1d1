// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Logger
 *
 * Level-aware logging utilities for pipeline diagnostics.
 * Provides graduated verbosity: NORMAL → VERBOSE → DEBUG → TRACE
 */

import chalk from 'chalk';

/**
 * Log levels for graduated verbosity.
 */
export enum LogLevel {
  /** Normal output - only essential information */
  NORMAL = 0,
  /** Verbose - pipeline stages with timing */
  VERBOSE = 1,
  /** Debug - provider calls, batch details */
  DEBUG = 2,
  /** Trace - full prompts and generated text */
  TRACE = 3,
}

/**
 * Parse log level from CLI options.
 */
export function parseLogLevel(options: {
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}): LogLevel {
  if (options.trace) return LogLevel.TRACE;
  if (options.debug) return LogLevel.DEBUG;
  if (options.verbose) return LogLevel.VERBOSE;
  return LogLevel.NORMAL;
}

/**
 * Centralized logger with level-aware output.
 */
class Logger {
  private level: LogLevel = LogLevel.NORMAL;

  /**
   * Set the current log level.
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Get the current log level.
   */
  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Check if a specific level is enabled.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return this.level >= level;
  }

  // ============================================
  // Level-aware logging methods
  // ============================================

  /**
   * Log at VERBOSE level (shows at VERBOSE, DEBUG, TRACE).
   */
  verbose(message: string): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      console.log(chalk.dim(message));
    }
  }

  /**
   * Log at DEBUG level (shows at DEBUG, TRACE).
   */
  debug(message: string): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.log(chalk.dim(`[Debug] ${message}`));
    }
  }

  /**
   * Log at TRACE level (shows only at TRACE).
   */
  trace(message: string): void {
    if (this.isLevelEnabled(LogLevel.TRACE)) {
      console.log(chalk.gray(`[Trace] ${message}`));
    }
  }

  // ============================================
  // Formatted output helpers
  // ============================================

  /**
   * Log a completed pipeline stage at VERBOSE level.
   */
  stage(name: string, durationMs: number, detail?: string): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      const seconds = (durationMs / 1000).toFixed(2);
      const suffix = detail ? `, ${detail}` : '';
      console.log(chalk.green(`✓ ${name}`) + chalk.dim(` (${seconds}s${suffix})`));
    }
  }

  /**
   * Log ingestion batch progress at DEBUG level.
   */
  batchProgress(batch: number, totalBatches: number, size: number, durationMs: number): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.log(chalk.dim(
        `[Ingest] Batch ${batch}/${totalBatches}: ${size} chunks, ${(durationMs / 1000).toFixed(2)}s`
      ));
    }
  }

  /**
   * Log a retrieval at DEBUG level.
   */
  retrieval(found: number, k: number, topScore?: number): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      const scoreStr = topScore !== undefined ? `, top score ${topScore.toFixed(3)}` : '';
      console.log(chalk.dim(`[Retrieve] ${found}/${k} documents${scoreStr}`));
    }
  }

  /**
   * Log a generation request at DEBUG level.
   */
  generationRequest(provider: string, model: string, promptLength: number, streaming: boolean): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      const mode = streaming ? 'streaming' : 'complete';
      console.log(chalk.dim(
        `[Generate] ${provider}/${model} (${promptLength.toLocaleString()} chars, ${mode})...`
      ));
    }
  }

  /**
   * Sanitize a string for safe terminal output.
   */
  private sanitize(str: string): string {
    // Replace control characters and escape sequences that could mess up the terminal
    return str
      .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '') // Remove control chars except \t, \n, \r
      .replace(/\r?\n/g, '\\n') // Show newlines as \n
      .replace(/\t/g, '\\t'); // Show tabs as \t
  }

  /**
   * Log a full prompt at TRACE level.
   */
  promptFull(model: string, prompt: string): void {
    if (this.isLevelEnabled(LogLevel.TRACE)) {
      console.log(chalk.gray('\n' + '='.repeat(60)));
      console.log(chalk.gray('[Prompt]'));
      console.log(chalk.gray('='.repeat(60)));
      console.log(chalk.gray(`  model: ${model}`));
      const truncated = prompt.length > 2000 ? prompt.slice(0, 2000) + '...' : prompt;
      console.log(chalk.gray(`  prompt: "${this.sanitize(truncated)}"`));
      console.log(chalk.gray('='.repeat(60) + '\n'));
    }
  }

  /**
   * Log a generated answer at TRACE level.
   */
  answerFull(answer: string, latencySeconds: number): void {
    if (this.isLevelEnabled(LogLevel.TRACE)) {
      const truncated = answer.length > 300 ? answer.slice(0, 300) + '...' : answer;
      console.log(chalk.gray(`[Answer] ${latencySeconds.toFixed(3)}s "${this.sanitize(truncated)}"`));
    }
  }

  /**
   * Log an error with optional stack trace at DEBUG level.
   */
  error(message: string, error?: Error): void {
    console.error(chalk.red(`Error: ${message}`));
    if (error && this.level >= LogLevel.DEBUG) {
      console.error(chalk.dim(error.stack || 'No stack trace available'));
    }
  }

  /**
   * Log a warning.
   */
  warn(message: string): void {
    console.warn(chalk.yellow(`Warning: ${message}`));
  }

}

/**
 * Singleton logger instance for global use.
 */
export const logger = new Logger();
