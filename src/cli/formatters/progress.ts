/**
 * Progress Formatters
 *
 * Spinner for long-running operations (transcript retrieval, the
 * completion call) and duration formatting.
 *
 * Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { Logger } from '../../logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Set false to keep the spinner silent (quiet or JSON output) */
  enabled?: boolean;
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * Renders only on a TTY; otherwise every method is a no-op so piped
 * output stays clean.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Fetching transcript...');
 * spinner.start();
 *
 * try {
 *   const { answer } = await service.answer(video, question);
 *   spinner.succeed('Answer ready');
 * } catch (err) {
 *   spinner.fail('Could not answer');
 * }
 * ```
 */
export class ProgressSpinner {
  private spinner: Ora;
  private readonly enabled: boolean;
  private startTime: number = 0;

  /**
   * Create a new progress spinner.
   *
   * @param text - Initial spinner text
   * @param options - Spinner options
   */
  constructor(text: string, options: SpinnerOptions = {}) {
    this.enabled = options.enabled !== false && process.stdout.isTTY === true;

    this.spinner = ora({
      text,
      color: 'cyan',
      isEnabled: this.enabled,
      stream: process.stdout,
    });
  }

  /**
   * Start the spinner.
   *
   * @param text - Optional text to display
   */
  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    if (this.enabled) {
      this.spinner.start();
    }
    return this;
  }

  /**
   * Update spinner text.
   */
  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop spinner with success state.
   *
   * @param text - Success message
   */
  succeed(text?: string): this {
    if (this.enabled) {
      const duration = Date.now() - this.startTime;
      const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
      this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    }
    return this;
  }

  /**
   * Stop spinner with failure state.
   */
  fail(text?: string): this {
    if (this.enabled) {
      this.spinner.fail(text);
    }
    return this;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format duration in milliseconds to human-readable string.
 *
 * @example
 * ```typescript
 * formatDuration(500);    // '500ms'
 * formatDuration(5500);   // '5.5s'
 * formatDuration(90000);  // '1m 30s'
 * ```
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Create a spinner for a single operation.
 */
export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}

/**
 * Route pipeline log messages to a spinner.
 *
 * Info and warning messages become the spinner text (without their
 * `[module]` prefix); debug and error messages go to `fallback`.
 */
export function createSpinnerLogger(spinner: ProgressSpinner, fallback: Logger): Logger {
  const show = (message: string): void => {
    spinner.update(message.replace(/^\[[\w-]+\]\s*/, ''));
  };

  return {
    debug: (message, ...args) => fallback.debug(message, ...args),
    info: (message) => show(message),
    warn: (message) => show(message),
    error: (message, ...args) => fallback.error(message, ...args),
  };
}
