/**
 * Transcript Retrieval
 *
 * Two-tier subtitle acquisition producing `RawCue` lists.
 *
 * Architecture:
 * - primary.ts: youtube-transcript lookup in language-preference order
 * - ytdlp.ts: yt-dlp metadata + VTT download fallback
 * - vtt.ts: WebVTT parsing and timestamp conversion
 * - fetcher.ts: ordered source chain with fallback on non-definitive errors
 * - errors.ts: error taxonomy
 *
 * @module transcript
 */

export { fetchTranscript, createDefaultSources, type DefaultSourcesOptions } from './fetcher.js';

export {
  createPrimarySource,
  classifyLookupError,
  segmentsToCues,
  createCaptionFormatRecorder,
  PRIMARY_SOURCE_NAME,
  type PrimarySourceOptions,
  type TranscriptLookupConfig,
  type CaptionTimeUnit,
  type CaptionFormatRecorder,
  type TranscriptLookupFn,
  type TranscriptSegmentResponse,
  type LookupFailure,
} from './primary.js';

export {
  createYtDlpSource,
  selectSubtitleUrl,
  buildYtDlpArgs,
  execFileRunner,
  YtDlpInfoSchema,
  YTDLP_SOURCE_NAME,
  type YtDlpSourceOptions,
  type YtDlpInfo,
  type ProcessRunner,
} from './ytdlp.js';

export {
  parseVtt,
  vttTimestampToSeconds,
  vttCuesToRawCues,
  VttSyntaxError,
  type VttCue,
} from './vtt.js';

export { cleanCaptionText } from './text.js';

export {
  TranscriptPipelineError,
  SubtitlesUnavailableError,
  VideoUnavailableError,
  TranscriptFetchError,
  NoSubtitlesAvailableError,
  SubtitleDownloadError,
  SubtitleParseError,
  describeLanguages,
  isTranscriptPipelineError,
  isDefinitiveTranscriptError,
} from './errors.js';

export type { RawCue, TranscriptSource, TranscriptResult } from './types.js';
