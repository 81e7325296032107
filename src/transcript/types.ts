/**
 * Transcript Types
 *
 * Shared shapes for subtitle retrieval. Both subtitle sources emit
 * `RawCue` lists in transcript order; the chunking engine consumes them.
 *
 * @module transcript/types
 */

/**
 * A single timed caption entry.
 */
export interface RawCue {
  /** Start time in seconds */
  readonly start: number;
  /** End time in seconds */
  readonly end: number;
  /** Caption text, stripped of surrounding whitespace */
  readonly text: string;
}

/**
 * A subtitle source that can produce cues for a video.
 *
 * Sources are tried in order by the transcript fetcher; a source signals
 * "try the next one" by throwing a `TranscriptFetchError`.
 */
export interface TranscriptSource {
  /** Source name used in logs and results */
  readonly name: string;

  /**
   * Fetch the cues for a video in the first available preferred language.
   *
   * @param videoId - 11-character video ID
   * @param languages - Preferred language codes, most preferred first
   */
  fetchCues(videoId: string, languages: readonly string[]): Promise<RawCue[]>;
}

/**
 * Cues together with the source that produced them.
 */
export interface TranscriptResult {
  videoId: string;
  /** Name of the source that succeeded */
  source: string;
  cues: RawCue[];
}
