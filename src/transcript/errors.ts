/**
 * Transcript Errors
 *
 * Error taxonomy for subtitle retrieval. "Definitive" errors mean the
 * video has no usable subtitles (or does not exist) and are never retried
 * through another source; `TranscriptFetchError` is the only error that
 * lets the fetcher move on to the fallback source.
 *
 * @module transcript/errors
 */

/**
 * Base class for every subtitle retrieval failure
 */
export class TranscriptPipelineError extends Error {
  constructor(
    message: string,
    public readonly videoId: string
  ) {
    super(message);
    this.name = 'TranscriptPipelineError';
  }
}

/**
 * No transcript exists in any preferred language (or transcripts are disabled)
 */
export class SubtitlesUnavailableError extends TranscriptPipelineError {
  constructor(
    videoId: string,
    public readonly languages: readonly string[]
  ) {
    super(`No subtitles available in ${describeLanguages(languages)}`, videoId);
    this.name = 'SubtitlesUnavailableError';
  }
}

/**
 * The video does not exist, is private or is otherwise restricted
 */
export class VideoUnavailableError extends TranscriptPipelineError {
  constructor(videoId: string) {
    super(`Video ${videoId} is not available`, videoId);
    this.name = 'VideoUnavailableError';
  }
}

/**
 * Transient or unknown failure of a transcript source
 */
export class TranscriptFetchError extends TranscriptPipelineError {
  constructor(
    message: string,
    videoId: string,
    public readonly source: string
  ) {
    super(message, videoId);
    this.name = 'TranscriptFetchError';
  }
}

/**
 * The extractor metadata contains no subtitle URL for any preferred language
 */
export class NoSubtitlesAvailableError extends TranscriptPipelineError {
  constructor(
    videoId: string,
    public readonly languages: readonly string[]
  ) {
    super(
      `No VTT subtitles available from yt-dlp in ${describeLanguages(languages)}`,
      videoId
    );
    this.name = 'NoSubtitlesAvailableError';
  }
}

/**
 * The subtitle file download returned a non-success status
 */
export class SubtitleDownloadError extends TranscriptPipelineError {
  constructor(
    message: string,
    videoId: string,
    public readonly statusCode: number
  ) {
    super(message, videoId);
    this.name = 'SubtitleDownloadError';
  }
}

/**
 * The subtitle file could not be parsed as WebVTT
 */
export class SubtitleParseError extends TranscriptPipelineError {
  constructor(message: string, videoId: string) {
    super(message, videoId);
    this.name = 'SubtitleParseError';
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

const LANGUAGE_NAMES: Record<string, string> = {
  es: 'Spanish',
  en: 'English',
  fr: 'French',
  de: 'German',
  it: 'Italian',
  pt: 'Portuguese',
};

/**
 * Render language codes for messages, e.g. `['es', 'en']` → "Spanish/English".
 */
export function describeLanguages(languages: readonly string[]): string {
  if (languages.length === 0) {
    return 'any language';
  }
  return languages.map((code) => LANGUAGE_NAMES[code] ?? code).join('/');
}

/**
 * Check if an error is any transcript pipeline error
 */
export function isTranscriptPipelineError(error: unknown): error is TranscriptPipelineError {
  return error instanceof TranscriptPipelineError;
}

/**
 * Check if an error should stop the source chain instead of falling back.
 *
 * Only `TranscriptFetchError` is non-definitive; anything else, including
 * errors that are not pipeline errors at all, ends the chain.
 */
export function isDefinitiveTranscriptError(error: unknown): boolean {
  return !(error instanceof TranscriptFetchError);
}
