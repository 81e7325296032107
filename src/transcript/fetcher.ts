/**
 * Transcript Fetcher
 *
 * Tries an ordered list of transcript sources. A source that fails with a
 * non-definitive error (`TranscriptFetchError`) hands over to the next
 * one; any other failure ends the chain and propagates unchanged. The
 * last source's error always propagates.
 *
 * @module transcript/fetcher
 */

import { silentLogger, type Logger } from '../logger.js';
import { isDefinitiveTranscriptError } from './errors.js';
import { createPrimarySource } from './primary.js';
import { createYtDlpSource } from './ytdlp.js';
import type { TranscriptResult, TranscriptSource } from './types.js';

/**
 * Options for building the default source chain
 */
export interface DefaultSourcesOptions {
  /** Timeout for the primary lookup and the subtitle download */
  timeoutMs?: number;
  /** yt-dlp executable */
  ytdlpBin?: string;
}

/**
 * Build the default chain: youtube-transcript, then yt-dlp.
 */
export function createDefaultSources(options: DefaultSourcesOptions = {}): TranscriptSource[] {
  return [
    createPrimarySource({ timeoutMs: options.timeoutMs }),
    createYtDlpSource({ binary: options.ytdlpBin, downloadTimeoutMs: options.timeoutMs }),
  ];
}

/**
 * Fetch cues for a video from the first source that succeeds.
 *
 * @param videoId - 11-character video ID
 * @param languages - Preferred languages, most preferred first
 * @param sources - Sources in priority order
 * @param logger - Optional logger
 * @throws The first definitive error, or the last source's error
 *
 * @example
 * ```typescript
 * const result = await fetchTranscript('dQw4w9WgXcQ', ['es', 'en'], createDefaultSources());
 * console.log(`${result.cues.length} cues from ${result.source}`);
 * ```
 */
export async function fetchTranscript(
  videoId: string,
  languages: readonly string[],
  sources: readonly TranscriptSource[],
  logger: Logger = silentLogger
): Promise<TranscriptResult> {
  if (sources.length === 0) {
    throw new Error('No transcript sources configured');
  }

  for (let i = 0; i < sources.length; i++) {
    const source = sources[i];
    const isLast = i === sources.length - 1;

    logger.info(`[transcript] Trying ${source.name} for ${videoId}`);
    try {
      const cues = await source.fetchCues(videoId, languages);
      logger.info(`[transcript] ${source.name} returned ${cues.length} cues`);
      return { videoId, source: source.name, cues };
    } catch (error) {
      if (isLast || isDefinitiveTranscriptError(error)) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`[transcript] ${source.name} failed (${message}), falling back to ${sources[i + 1].name}`);
    }
  }

  // Unreachable: the loop either returns or throws on the last source
  throw new Error('No transcript source succeeded');
}
