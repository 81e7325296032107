/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 *
 * Available commands:
 * - ask: Answer a question about a video
 * - chunks: Print a video's timestamped transcript chunks
 * - serve: Start the HTTP service
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import type { CliDeps } from '../deps.js';
import { registerAskCommand } from './ask.js';
import { registerChunksCommand } from './chunks.js';
import { registerServeCommand } from './serve.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command, deps: CliDeps): void {
  registerAskCommand(program, deps);
  registerChunksCommand(program, deps);
  registerServeCommand(program, deps);
}
