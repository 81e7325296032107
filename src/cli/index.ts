/**
 * video-qa CLI
 *
 * Main entry point for the video-qa command line tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   video-qa --help
 *   video-qa ask https://youtu.be/dQw4w9WgXcQ "What is the song about?"
 *   video-qa chunks dQw4w9WgXcQ --lang en --max-seconds 60
 *   video-qa serve --port 8000
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, EXIT_CODES, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';
import { defaultCliDeps, type CliDeps } from './deps.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 *
 * @param deps - Collaborators for the commands (default: real config, pipeline and server)
 * @returns Configured commander Program instance
 */
export function createProgram(deps: CliDeps = defaultCliDeps): Command {
  const program = new Command();

  // Program metadata
  program
    .name('video-qa')
    .description('Answer questions about YouTube videos from their subtitles')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output');

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    const baseCommand = new BaseCommand(opts);

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    // Validate mutually exclusive flags
    if (opts.verbose && opts.quiet) {
      baseCommand.error('Cannot use both --verbose and --quiet flags', EXIT_CODES.USAGE_ERROR);
    }
  });

  // Commander errors are usage errors. Set before registering commands:
  // subcommands copy the setting when they are created.
  program.exitOverride((err) => {
    if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
      process.exit(EXIT_CODES.SUCCESS);
    }
    process.exit(EXIT_CODES.USAGE_ERROR);
  });

  registerCommands(program, deps);

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    // Error already handled by commander or base command
    if (error instanceof Error && error.message) {
      console.error(`Error: ${error.message}`);
    }
    process.exit(EXIT_CODES.ERROR);
  }
}
