/**
 * Completion Client
 *
 * Streams a chat completion from an OpenAI-compatible endpoint (Groq by
 * default) through the openai SDK and returns the accumulated answer.
 * Handles authentication, timeouts and error mapping; no retries are
 * performed.
 *
 * @module completion/client
 */

import OpenAI from 'openai';
import { requireApiKey, type AppConfig } from '../config/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * The part of a streamed chunk the client reads
 */
export interface CompletionStreamChunk {
  choices: Array<{
    delta?: {
      content?: string | null;
    };
  }>;
}

/**
 * Parameters of one completion request
 */
export interface CompletionRequest {
  model: string;
  prompt: string;
  temperature: number;
  topP: number;
  maxCompletionTokens: number;
}

/**
 * Opens a completion stream; aborting `signal` must end it.
 */
export type CreateStreamFn = (
  request: CompletionRequest,
  signal: AbortSignal
) => Promise<AsyncIterable<CompletionStreamChunk>>;

export interface CompletionClient {
  /** Send the prompt as a single user message and return the trimmed answer */
  complete(prompt: string): Promise<string>;
}

export interface CompletionClientOptions {
  /** Stream factory (default: openai SDK against the configured endpoint) */
  createStream?: CreateStreamFn;
}

/**
 * Completion API error with additional context.
 */
export class CompletionServiceError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly isRetryable: boolean
  ) {
    super(message);
    this.name = 'CompletionServiceError';
  }
}

const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

// ============================================================================
// Client Implementation
// ============================================================================

/**
 * Create the default stream factory over the openai SDK.
 *
 * @throws ConfigurationError if GROQ_API_KEY is not set
 */
export function createOpenAIStreamFactory(config: AppConfig): CreateStreamFn {
  const client = new OpenAI({
    apiKey: requireApiKey(config),
    baseURL: config.completion.baseUrl,
    maxRetries: 0,
  });

  return async (request, signal) =>
    client.chat.completions.create(
      {
        model: request.model,
        messages: [{ role: 'user', content: request.prompt }],
        temperature: request.temperature,
        top_p: request.topP,
        max_completion_tokens: request.maxCompletionTokens,
        stream: true,
      },
      { signal }
    );
}

/**
 * Create a completion client for the configured model.
 *
 * @throws ConfigurationError if no stream factory is injected and the API key is missing
 *
 * @example
 * ```typescript
 * const client = createCompletionClient(loadConfig());
 * const answer = await client.complete(prompt);
 * ```
 */
export function createCompletionClient(
  config: AppConfig,
  options: CompletionClientOptions = {}
): CompletionClient {
  const createStream = options.createStream ?? createOpenAIStreamFactory(config);
  const { model, timeoutMs } = config.completion;

  return {
    async complete(prompt: string): Promise<string> {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

      try {
        const stream = await createStream(
          {
            model: model.modelId,
            prompt,
            temperature: model.temperature,
            topP: model.topP,
            maxCompletionTokens: model.maxOutputTokens,
          },
          controller.signal
        );
        return await collectStream(stream);
      } catch (error) {
        throw toCompletionServiceError(error, controller.signal.aborted, timeoutMs);
      } finally {
        clearTimeout(timeoutId);
      }
    },
  };
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Concatenate every fragment's delta and trim the result.
 *
 * Fragments without choices, or whose delta content is missing or null,
 * contribute nothing.
 */
export async function collectStream(fragments: AsyncIterable<CompletionStreamChunk>): Promise<string> {
  let answer = '';
  for await (const fragment of fragments) {
    answer += fragment.choices[0]?.delta?.content ?? '';
  }
  return answer.trim();
}

/**
 * Map any failure of the completion call to CompletionServiceError.
 */
export function toCompletionServiceError(
  error: unknown,
  timedOut: boolean,
  timeoutMs: number
): CompletionServiceError {
  if (error instanceof CompletionServiceError) {
    return error;
  }

  if (timedOut) {
    return new CompletionServiceError(`Completion request timed out after ${timeoutMs}ms`, 408, true);
  }

  if (error instanceof OpenAI.APIError) {
    const statusCode = error.status ?? 500;
    return new CompletionServiceError(error.message, statusCode, RETRYABLE_STATUSES.has(statusCode));
  }

  return new CompletionServiceError(
    error instanceof Error ? error.message : 'Unknown error',
    500,
    true
  );
}
