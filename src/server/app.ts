/**
 * HTTP Service
 *
 * Hono app exposing the question-answering pipeline:
 * - `POST /qa` `{ video, question }` → `{ answer }`
 * - `GET /health` → `{ ok: true }`
 *
 * Invalid bodies get 422 with the validation issues; any pipeline error
 * gets 500 with its message as `detail`.
 *
 * @module server/app
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve, type ServerType } from '@hono/node-server';
import type { AppConfig } from '../config/index.js';
import { silentLogger, type Logger } from '../logger.js';
import { createQaService, type QaService } from '../qa/index.js';
import { createOriginMatcher } from './cors.js';
import { QaRequestSchema, formatZodError, type QaResponse } from './schemas.js';

export interface QaAppDeps {
  service: QaService;
  /** Allowed origin patterns */
  corsOrigins: readonly string[];
  logger?: Logger;
}

/**
 * Create the Hono app.
 */
export function createQaApp(deps: QaAppDeps): Hono {
  const logger = deps.logger ?? silentLogger;
  const app = new Hono();

  app.use(
    '*',
    cors({
      origin: createOriginMatcher(deps.corsOrigins),
      credentials: true,
      allowMethods: ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    })
  );

  app.get('/health', (c) => c.json({ ok: true }));

  app.post('/qa', async (c) => {
    const body = await readJsonBody(c.req.raw);
    const parsed = QaRequestSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ detail: formatZodError(parsed.error) }, 422);
    }

    const { video, question } = parsed.data;
    logger.info(`[server] POST /qa video=${video}`);
    const { answer } = await deps.service.answer(video, question);
    const response: QaResponse = { answer };
    return c.json(response);
  });

  app.onError((error, c) => {
    logger.error(`[server] Request failed: ${error.message}`);
    return c.json({ detail: error.message }, 500);
  });

  return app;
}

/**
 * Parse a JSON body, or null when it is missing or malformed.
 */
async function readJsonBody(request: Request): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    return null;
  }
}

/**
 * Serve the app on the configured port.
 *
 * @example
 * ```typescript
 * const server = startServer(loadConfig(), createConsoleLogger());
 * ```
 */
export function startServer(
  config: AppConfig,
  logger: Logger = silentLogger,
  service: QaService = createQaService(config, { logger })
): ServerType {
  const app = createQaApp({ service, corsOrigins: config.server.corsOrigins, logger });
  const { port } = config.server;

  return serve({ fetch: app.fetch, port }, (info) => {
    logger.info(`[server] Listening on http://localhost:${info.port}`);
  });
}
