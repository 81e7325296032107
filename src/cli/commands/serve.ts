/**
 * Serve Command
 *
 * Starts the HTTP service in the foreground.
 *
 * @module cli/commands/serve
 */

import type { EventEmitter } from 'node:events';
import type { Command } from 'commander';
import { getBaseCommand } from '../base-command.js';
import type { CliDeps } from '../deps.js';
import { getVersionInfo } from '../version.js';
import { createConsoleLogger } from '../../logger.js';
import { parsePort } from './options.js';

export interface ServeOptions {
  port?: number;
}

/**
 * Register the serve command.
 */
export function registerServeCommand(program: Command, deps: CliDeps): void {
  program
    .command('serve')
    .description('Start the HTTP service (POST /qa, GET /health)')
    .option('-p, --port <port>', 'Port to listen on (default: PORT or 8000)', parsePort)
    .action((options: ServeOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      try {
        const loaded = deps.loadConfig();
        const config = {
          ...loaded,
          server: { ...loaded.server, port: options.port ?? loaded.server.port },
        };
        const logger = createConsoleLogger(base.isVerbose() ? 'debug' : 'info');

        logger.info(`[server] Starting ${getVersionInfo()}`);
        const server: EventEmitter = deps.startServer(
          config,
          logger,
          deps.createService(config, logger)
        );

        // Listen failures (EADDRINUSE, EACCES) arrive after startServer returns
        server.on('error', (error: Error) => {
          logger.error(`[server] ${error.message}`);
          base.handleError(error);
        });
      } catch (error) {
        base.handleError(error);
      }
    });
}
