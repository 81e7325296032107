/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color)
 * - Consistent error handling and exit codes
 * - Output utilities (log, warn, error)
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import { ConfigurationError } from '../config/index.js';
import { CompletionServiceError } from '../completion/index.js';
import type { Logger } from '../logger.js';
import {
  NoSubtitlesAvailableError,
  SubtitleDownloadError,
  SubtitlesUnavailableError,
  TranscriptFetchError,
  VideoUnavailableError,
} from '../transcript/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export type GlobalOptions = {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
};

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Invalid usage, arguments or configuration */
  USAGE_ERROR: 2,
  /** Video or subtitles not found */
  NOT_FOUND: 3,
  /** Transcript service, subtitle download or completion API error */
  API_ERROR: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Pick the exit code for an error raised by a command.
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof ConfigurationError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  if (
    error instanceof SubtitlesUnavailableError ||
    error instanceof VideoUnavailableError ||
    error instanceof NoSubtitlesAvailableError
  ) {
    return EXIT_CODES.NOT_FOUND;
  }
  if (
    error instanceof CompletionServiceError ||
    error instanceof TranscriptFetchError ||
    error instanceof SubtitleDownloadError
  ) {
    return EXIT_CODES.API_ERROR;
  }
  return EXIT_CODES.ERROR;
}

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * All command handlers should receive a BaseCommand instance
 * to access consistent logging, error handling, and options.
 *
 * @example
 * ```typescript
 * async function chunksHandler(video: string, options: ChunksOptions, cmd: Command) {
 *   const base = getBaseCommand(cmd.parent ?? cmd);
 *
 *   try {
 *     const transcript = await service.chunks(video);
 *     base.keyValue('Chunks', transcript.chunks.length);
 *   } catch (err) {
 *     base.handleError(err);
 *   }
 * }
 * ```
 */
export class BaseCommand {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  constructor(options: GlobalOptions) {
    this.options = options;

    // Configure chalk based on color preference
    if (options.color === false || process.stdout.isTTY !== true) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Log an error message and exit.
   *
   * @param message - Error message
   * @param errorOrCode - Error object or exit code
   */
  error(message: string, errorOrCode?: Error | ExitCode): never {
    console.error(chalk.red(`Error: ${message}`));

    if (errorOrCode instanceof Error) {
      if (this.options.verbose) {
        console.error(chalk.dim(errorOrCode.stack ?? errorOrCode.message));
      }
      process.exit(exitCodeForError(errorOrCode));
    } else if (typeof errorOrCode === 'number') {
      process.exit(errorOrCode);
    }
    process.exit(EXIT_CODES.ERROR);
  }

  /**
   * Report a failed command and exit with the matching code.
   */
  handleError(error: unknown): never {
    if (error instanceof Error) {
      return this.error(error.message, error);
    }
    return this.error(String(error), EXIT_CODES.ERROR);
  }

  /**
   * Print command output (shown even in quiet mode).
   */
  output(text: string): void {
    console.log(text);
  }

  /**
   * Print data as formatted JSON.
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Print a key-value pair.
   */
  keyValue(key: string, value: string | number): void {
    if (!this.options.quiet) {
      console.log(`${chalk.dim(key + ':')} ${value}`);
    }
  }

  /**
   * Expose the output methods as a pipeline logger.
   * Pipeline progress is debug output on the command line.
   */
  toLogger(): Logger {
    return {
      debug: (message, ...args) => this.debug(message, ...args),
      info: (message, ...args) => this.debug(message, ...args),
      warn: (message, ...args) => this.warn(message, ...args),
      error: (message, ...args) => console.error(chalk.red(message), ...args),
    };
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  /**
   * Check if verbose mode is enabled.
   */
  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  /**
   * Check if quiet mode is enabled.
   */
  isQuiet(): boolean {
    return this.options.quiet === true;
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Get the base command from a commander Command instance.
 * Used by subcommand handlers to access shared functionality.
 *
 * @param cmd - Commander command instance
 * @returns BaseCommand, or a default one if not found (for testing)
 */
export function getBaseCommand(cmd: { opts(): Record<string, unknown> }): BaseCommand {
  const base = cmd.opts()['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    return new BaseCommand({});
  }
  return base;
}
