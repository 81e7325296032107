/**
 * Completion Module
 *
 * @module completion
 */

export {
  createCompletionClient,
  createOpenAIStreamFactory,
  collectStream,
  toCompletionServiceError,
  CompletionServiceError,
  type CompletionClient,
  type CompletionClientOptions,
  type CompletionRequest,
  type CompletionStreamChunk,
  type CreateStreamFn,
} from './client.js';
