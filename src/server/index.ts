/**
 * Server Module
 *
 * @module server
 */

export { createQaApp, startServer, type QaAppDeps } from './app.js';
export { createOriginMatcher } from './cors.js';
export {
  QaRequestSchema,
  QaResponseSchema,
  formatZodError,
  type QaRequest,
  type QaResponse,
} from './schemas.js';
