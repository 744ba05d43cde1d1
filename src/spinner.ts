// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Spinner Manager
 *
 * Centralized spinner management using ora for visual feedback during long operations.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Manages a single spinner instance with TTY detection and state management.
 */
class SpinnerManager {
  private spinner: Ora | null = null;
  private enabled: boolean = true;

  constructor() {
    // Disable spinners in non-TTY environments (piped output)
    this.enabled = process.stdout.isTTY ?? false;
  }

  /**
   * Enable or disable spinners globally.
   */
  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled && this.spinner) {
      this.stop();
    }
  }

  /**
   * Check if spinners are currently enabled.
   */
  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Start a new spinner with the given text.
   * If a spinner is already running, it will be stopped first.
   */
  start(text: string): void {
    if (!this.isEnabled()) return;

    try {
      if (this.spinner) {
        this.spinner.stop();
      }

      this.spinner = ora({
        text,
        color: 'cyan',
        spinner: 'dots',
        discardStdin: false, // Don't interfere with readline's stdin handling
      }).start();
    } catch {
      // Silently ignore spinner errors - they shouldn't break the app
      this.spinner = null;
    }
  }

  /**
   * Update the spinner text.
   */
  update(text: string): void {
    if (this.spinner && this.isEnabled()) {
      this.spinner.text = text;
    }
  }

  /**
   * Stop the spinner without any status symbol.
   */
  stop(): void {
    try {
      if (this.spinner) {
        this.spinner.stop();
        this.spinner = null;
      }
    } catch {
      this.spinner = null;
    }
  }

  // ============================================
  // Convenience methods for common operations
  // ============================================

  /**
   * Show spinner while documents are retrieved and the answer is generated.
   */
  thinking(mode: string): void {
    this.start(chalk.cyan(`Thinking (${mode} mode)...`));
  }

  /**
   * Show spinner while files are loaded and chunked.
   */
  loading(directory: string): void {
    this.start(chalk.blue(`Loading documents from ${directory}...`));
  }

  /**
   * Show ingestion progress.
   */
  indexing(batch: number, totalBatches: number, stored: number): void {
    const text = chalk.blue(`Indexing batch ${batch}/${totalBatches} (${stored} chunks stored)`);

    if (this.spinner) {
      this.update(text);
    } else {
      this.start(text);
    }
  }

}

/**
 * Singleton spinner instance for global use.
 */
export const spinner = new SpinnerManager();
