/**
 * Primary Transcript Source
 *
 * Fetches captions through the youtube-transcript npm package, which
 * reads YouTube's caption data without authentication. Languages are
 * tried in preference order and the first one with a transcript wins.
 *
 * youtube-transcript reports times in whatever unit the caption body
 * used: seconds for the classic `<text start dur>` format, milliseconds
 * for srv3 `<p t d>` bodies. The lookup is handed a recording `fetch` so
 * the unit of the last caption body can be applied to the segments.
 *
 * Error mapping:
 * - transcripts disabled / none in any preferred language → SubtitlesUnavailableError
 * - video unavailable → VideoUnavailableError
 * - anything else (rate limiting, network, timeout) → TranscriptFetchError,
 *   which lets the fetcher fall back to yt-dlp
 *
 * @module transcript/primary
 */

import { YoutubeTranscript } from 'youtube-transcript';
import {
  SubtitlesUnavailableError,
  TranscriptFetchError,
  VideoUnavailableError,
} from './errors.js';
import { cleanCaptionText } from './text.js';
import type { RawCue, TranscriptSource } from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A caption segment as returned by youtube-transcript
 */
export interface TranscriptSegmentResponse {
  text: string;
  /** Start time, in the caption body's unit */
  offset: number;
  /** Duration, in the caption body's unit */
  duration: number;
}

export type FetchFn = typeof fetch;

export interface TranscriptLookupConfig {
  lang?: string;
  /** HTTP client the lookup must use for its requests */
  fetch?: FetchFn;
}

/**
 * Signature of `YoutubeTranscript.fetchTranscript`
 */
export type TranscriptLookupFn = (
  videoId: string,
  config?: TranscriptLookupConfig
) => Promise<TranscriptSegmentResponse[]>;

export interface PrimarySourceOptions {
  /** Lookup function (default: youtube-transcript) */
  lookup?: TranscriptLookupFn;
  /** HTTP client underneath the lookup (default: global fetch) */
  fetchFn?: FetchFn;
  /** Timeout per language attempt in milliseconds (default: 10000) */
  timeoutMs?: number;
}

export type CaptionTimeUnit = 'seconds' | 'milliseconds';

/**
 * Fetch wrapper that remembers the time unit of the last caption body
 */
export interface CaptionFormatRecorder {
  fetch: FetchFn;
  unit(): CaptionTimeUnit;
}

/**
 * Outcome classes for a failed lookup
 */
export type LookupFailure =
  | 'disabled'
  | 'not-found'
  | 'language-missing'
  | 'video-unavailable'
  | 'other';

export const PRIMARY_SOURCE_NAME = 'youtube-transcript';

const DEFAULT_TIMEOUT_MS = 10000;

const SRV3_CUE_PATTERN = /<p\s+t="\d+"/;
const CLASSIC_CUE_PATTERN = /<text\s+start="/;

// ============================================================================
// Source
// ============================================================================

/**
 * Create the primary transcript source.
 *
 * @example
 * ```typescript
 * const source = createPrimarySource({ timeoutMs: 5000 });
 * const cues = await source.fetchCues('dQw4w9WgXcQ', ['es', 'en']);
 * ```
 */
export function createPrimarySource(options: PrimarySourceOptions = {}): TranscriptSource {
  const lookup: TranscriptLookupFn =
    options.lookup ?? ((videoId, config) => YoutubeTranscript.fetchTranscript(videoId, config));
  const baseFetch: FetchFn = options.fetchFn ?? ((input, init) => globalThis.fetch(input, init));
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return {
    name: PRIMARY_SOURCE_NAME,

    async fetchCues(videoId: string, languages: readonly string[]): Promise<RawCue[]> {
      for (const lang of languages) {
        const recorder = createCaptionFormatRecorder(baseFetch);
        let segments: TranscriptSegmentResponse[];
        try {
          segments = await withTimeout(
            () => lookup(videoId, { lang, fetch: recorder.fetch }),
            timeoutMs,
            videoId
          );
        } catch (error) {
          if (error instanceof TranscriptFetchError) {
            throw error;
          }

          switch (classifyLookupError(error)) {
            case 'language-missing':
              continue;
            case 'disabled':
            case 'not-found':
              throw new SubtitlesUnavailableError(videoId, languages);
            case 'video-unavailable':
              throw new VideoUnavailableError(videoId);
            default:
              throw new TranscriptFetchError(
                `youtube-transcript failed: ${error instanceof Error ? error.message : String(error)}`,
                videoId,
                PRIMARY_SOURCE_NAME
              );
          }
        }

        const cues = segmentsToCues(segments, recorder.unit());
        if (cues.length > 0) {
          return cues;
        }
      }

      throw new SubtitlesUnavailableError(videoId, languages);
    },
  };
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Convert service segments into cues (`end = start + duration`), in seconds.
 */
export function segmentsToCues(
  segments: TranscriptSegmentResponse[],
  unit: CaptionTimeUnit = 'seconds'
): RawCue[] {
  const divisor = unit === 'milliseconds' ? 1000 : 1;
  const cues: RawCue[] = [];
  for (const segment of segments) {
    const text = cleanCaptionText(segment.text);
    if (!text) {
      continue;
    }
    cues.push({
      start: segment.offset / divisor,
      end: (segment.offset + segment.duration) / divisor,
      text,
    });
  }
  return cues;
}

/**
 * Wrap a fetch so the unit of the last caption body it returned is known.
 *
 * Bodies that are neither srv3 nor classic captions (the watch page,
 * InnerTube JSON) leave the recorded unit alone.
 */
export function createCaptionFormatRecorder(baseFetch: FetchFn): CaptionFormatRecorder {
  let unit: CaptionTimeUnit = 'seconds';

  const recordingFetch: FetchFn = async (input, init) => {
    const response = await baseFetch(input, init);
    if (response.ok) {
      const body = await response.clone().text();
      if (SRV3_CUE_PATTERN.test(body)) {
        unit = 'milliseconds';
      } else if (CLASSIC_CUE_PATTERN.test(body)) {
        unit = 'seconds';
      }
    }
    return response;
  };

  return {
    fetch: recordingFetch,
    unit: () => unit,
  };
}

/**
 * Classify a youtube-transcript failure by its message.
 *
 * The package's error classes are transpiled, so `instanceof` checks
 * against them are unreliable; the messages are stable.
 */
export function classifyLookupError(error: unknown): LookupFailure {
  if (!(error instanceof Error)) {
    return 'other';
  }

  const message = error.message.toLowerCase();

  if (
    message.includes('no longer available') ||
    message.includes('video unavailable') ||
    message.includes('private video')
  ) {
    return 'video-unavailable';
  }
  if (
    message.includes('transcript is disabled') ||
    message.includes('transcripts are disabled') ||
    message.includes('disabled on this video')
  ) {
    return 'disabled';
  }
  if (message.includes('no transcripts are available in')) {
    return 'language-missing';
  }
  if (message.includes('no transcripts are available') || message.includes('no transcript')) {
    return 'not-found';
  }
  return 'other';
}

/**
 * Race a lookup against a timeout, cleaning up the timer either way.
 */
async function withTimeout<T>(fn: () => Promise<T>, timeoutMs: number, videoId: string): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(
        new TranscriptFetchError(
          `Transcript lookup timed out after ${timeoutMs}ms`,
          videoId,
          PRIMARY_SOURCE_NAME
        )
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeoutPromise]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}
