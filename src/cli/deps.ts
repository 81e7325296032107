/**
 * CLI Dependencies
 *
 * Collaborators the commands use, injectable so the program can be
 * exercised without network access.
 *
 * @module cli/deps
 */

import type { ServerType } from '@hono/node-server';
import { loadConfig, type AppConfig } from '../config/index.js';
import type { Logger } from '../logger.js';
import { createQaService, type QaService } from '../qa/index.js';
import { startServer } from '../server/index.js';

export interface CliDeps {
  /** Read configuration (throws ConfigurationError when invalid) */
  loadConfig(): AppConfig;
  createService(config: AppConfig, logger: Logger): QaService;
  startServer(config: AppConfig, logger: Logger, service: QaService): ServerType;
}

export const defaultCliDeps: CliDeps = {
  loadConfig: () => loadConfig(),
  createService: (config, logger) => createQaService(config, { logger }),
  startServer: (config, logger, service) => startServer(config, logger, service),
};
