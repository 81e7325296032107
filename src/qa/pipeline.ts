/**
 * Question-Answering Pipeline
 *
 * Wires the stages together: video ID extraction, transcript retrieval
 * with fallback, chunking, prompt building and completion. Every
 * collaborator is injected, and every error propagates unchanged to the
 * caller (HTTP handler or CLI command).
 *
 * @module qa/pipeline
 */

import type { AppConfig } from '../config/index.js';
import { chunkCues, type Chunk, type ChunkOptions } from '../chunking/index.js';
import { createCompletionClient, type CompletionClient } from '../completion/index.js';
import { silentLogger, type Logger } from '../logger.js';
import { buildQaPrompt } from '../prompt/index.js';
import {
  createDefaultSources,
  fetchTranscript,
  type TranscriptSource,
} from '../transcript/index.js';
import { extractVideoId } from '../video/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Collaborators for transcript retrieval and chunking
 */
export interface RetrievalDependencies {
  /** Transcript sources in priority order */
  sources: readonly TranscriptSource[];
  /** Preferred languages, most preferred first */
  languages: readonly string[];
  /** Chunk thresholds */
  chunking?: ChunkOptions;
  logger?: Logger;
}

/**
 * Collaborators for the full question-answering pipeline
 */
export interface QaDependencies extends RetrievalDependencies {
  completion: CompletionClient;
}

/**
 * Chunked transcript of one video
 */
export interface TimestampedTranscript {
  videoId: string;
  /** Name of the source that produced the cues */
  source: string;
  chunks: Chunk[];
}

/**
 * Answer to a question, with the video it was asked about
 */
export interface QaAnswer {
  videoId: string;
  answer: string;
}

/**
 * Per-call overrides for transcript retrieval
 */
export interface ChunkRequestOptions {
  languages?: readonly string[];
  maxSeconds?: number;
  maxChars?: number;
}

/**
 * Configured pipeline, shared by the HTTP service and the CLI
 */
export interface QaService {
  answer(video: string, question: string): Promise<QaAnswer>;
  chunks(video: string, options?: ChunkRequestOptions): Promise<TimestampedTranscript>;
}

export interface QaServiceOverrides {
  sources?: readonly TranscriptSource[];
  completion?: CompletionClient;
  logger?: Logger;
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * Retrieve a video's transcript and merge it into timestamped chunks.
 *
 * @param video - Video ID or URL
 * @throws Whatever the transcript sources raise
 */
export async function getTimestampedChunks(
  video: string,
  deps: RetrievalDependencies
): Promise<TimestampedTranscript> {
  const logger = deps.logger ?? silentLogger;
  const videoId = extractVideoId(video);
  logger.info(`[qa] Fetching transcript for ${videoId}`);

  const transcript = await fetchTranscript(videoId, deps.languages, deps.sources, logger);
  const chunks = chunkCues(transcript.cues, deps.chunking);
  logger.info(`[qa] Merged ${transcript.cues.length} cues into ${chunks.length} chunks`);

  return { videoId, source: transcript.source, chunks };
}

/**
 * Answer a question about a video's spoken content.
 *
 * @param video - Video ID or URL
 * @param question - The user's question
 * @returns The extracted video ID and the model's answer, trimmed
 *
 * @example
 * ```typescript
 * const { answer } = await answerQuestion('https://youtu.be/dQw4w9WgXcQ', '¿De qué habla?', {
 *   sources: createDefaultSources(),
 *   languages: ['es', 'en'],
 *   completion: createCompletionClient(config),
 * });
 * ```
 */
export async function answerQuestion(
  video: string,
  question: string,
  deps: QaDependencies
): Promise<QaAnswer> {
  const logger = deps.logger ?? silentLogger;
  const { videoId, chunks } = await getTimestampedChunks(video, deps);

  const prompt = buildQaPrompt(chunks, question);
  logger.debug(`[qa] Prompt built (${prompt.length} chars)`);

  const answer = await deps.completion.complete(prompt);
  logger.info(`[qa] Answer received (${answer.length} chars)`);
  return { videoId, answer };
}

/**
 * Build the pipeline from configuration.
 *
 * The completion client is created on first use, so retrieval-only
 * callers do not need an API key.
 *
 * @param config - Application configuration
 * @param overrides - Replacement collaborators (tests, alternative sources)
 */
export function createQaService(config: AppConfig, overrides: QaServiceOverrides = {}): QaService {
  const sources =
    overrides.sources ??
    createDefaultSources({
      timeoutMs: config.transcript.timeoutMs,
      ytdlpBin: config.transcript.ytdlpBin,
    });
  const logger = overrides.logger ?? silentLogger;
  let completion = overrides.completion;

  const retrieval = (options: ChunkRequestOptions = {}): RetrievalDependencies => ({
    sources,
    languages: options.languages ?? config.transcript.languages,
    chunking: {
      maxSeconds: options.maxSeconds ?? config.chunking.maxSeconds,
      maxChars: options.maxChars ?? config.chunking.maxChars,
    },
    logger,
  });

  return {
    async answer(video, question) {
      const client = (completion ??= createCompletionClient(config));
      return answerQuestion(video, question, { ...retrieval(), completion: client });
    },

    async chunks(video, options) {
      return getTimestampedChunks(video, retrieval(options));
    },
  };
}
