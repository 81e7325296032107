/**
 * yt-dlp Fallback Source
 *
 * When the primary lookup fails for a non-definitive reason, asks yt-dlp
 * for the video's metadata (no media download), picks a subtitle URL in
 * the preferred languages, downloads the VTT file and parses it.
 *
 * Subtitle selection scans `requested_subtitles`, then
 * `automatic_captions`, then `subtitles`, using the first non-empty
 * mapping, and within it the first preferred language present.
 *
 * @module transcript/ytdlp
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { z } from 'zod';
import { buildWatchUrl } from '../video/video-id.js';
import {
  NoSubtitlesAvailableError,
  SubtitleDownloadError,
  SubtitleParseError,
  TranscriptFetchError,
} from './errors.js';
import { parseVtt, vttCuesToRawCues, type VttCue } from './vtt.js';
import type { RawCue, TranscriptSource } from './types.js';

// ============================================================================
// Types
// ============================================================================

type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Runs an executable and resolves with its stdout
 */
export type ProcessRunner = (
  file: string,
  args: string[],
  options: { timeoutMs: number }
) => Promise<{ stdout: string }>;

export interface YtDlpSourceOptions {
  /** yt-dlp executable (default: "yt-dlp") */
  binary?: string;
  /** Process runner (default: child_process.execFile) */
  run?: ProcessRunner;
  /** HTTP fetch used for the subtitle download (default: global fetch) */
  fetchFn?: FetchFn;
  /** Subtitle download timeout in milliseconds (default: 10000) */
  downloadTimeoutMs?: number;
  /** Metadata extraction timeout in milliseconds (default: 60000) */
  extractTimeoutMs?: number;
}

// ============================================================================
// Metadata Schema
// ============================================================================

const SubtitleEntrySchema = z
  .object({
    url: z.string().optional(),
    ext: z.string().optional(),
  })
  .passthrough();

const SubtitleMapSchema = z.record(z.union([SubtitleEntrySchema, z.array(SubtitleEntrySchema)]));

/**
 * The parts of yt-dlp's info JSON that subtitle selection reads
 */
export const YtDlpInfoSchema = z
  .object({
    requested_subtitles: SubtitleMapSchema.nullish(),
    automatic_captions: SubtitleMapSchema.nullish(),
    subtitles: SubtitleMapSchema.nullish(),
  })
  .passthrough();

export type YtDlpInfo = z.infer<typeof YtDlpInfoSchema>;
export type SubtitleEntry = z.infer<typeof SubtitleEntrySchema>;

// ============================================================================
// Constants
// ============================================================================

export const YTDLP_SOURCE_NAME = 'yt-dlp';

const DEFAULTS = {
  binary: 'yt-dlp',
  downloadTimeoutMs: 10000,
  extractTimeoutMs: 60000,
  /** Info JSON for long videos with many caption tracks runs to several MB */
  maxBuffer: 64 * 1024 * 1024,
} as const;

const execFileAsync = promisify(execFile);

/**
 * Default runner built on child_process.execFile
 */
export const execFileRunner: ProcessRunner = async (file, args, options) => {
  const { stdout } = await execFileAsync(file, args, {
    timeout: options.timeoutMs,
    maxBuffer: DEFAULTS.maxBuffer,
    encoding: 'utf8',
  });
  return { stdout };
};

// ============================================================================
// Source
// ============================================================================

/**
 * Create the yt-dlp fallback source.
 *
 * @example
 * ```typescript
 * const source = createYtDlpSource({ binary: '/usr/local/bin/yt-dlp' });
 * const cues = await source.fetchCues('dQw4w9WgXcQ', ['es', 'en']);
 * ```
 */
export function createYtDlpSource(options: YtDlpSourceOptions = {}): TranscriptSource {
  const binary = options.binary ?? DEFAULTS.binary;
  const run = options.run ?? execFileRunner;
  const fetchFn: FetchFn = options.fetchFn ?? ((input, init) => globalThis.fetch(input, init));
  const downloadTimeoutMs = options.downloadTimeoutMs ?? DEFAULTS.downloadTimeoutMs;
  const extractTimeoutMs = options.extractTimeoutMs ?? DEFAULTS.extractTimeoutMs;

  return {
    name: YTDLP_SOURCE_NAME,

    async fetchCues(videoId: string, languages: readonly string[]): Promise<RawCue[]> {
      const info = await extractInfo(videoId, languages, binary, run, extractTimeoutMs);

      const subtitleUrl = selectSubtitleUrl(info, languages);
      if (!subtitleUrl) {
        throw new NoSubtitlesAvailableError(videoId, languages);
      }

      const body = await downloadSubtitles(subtitleUrl, videoId, fetchFn, downloadTimeoutMs);

      let cues: VttCue[];
      try {
        cues = parseVtt(body);
      } catch (error) {
        throw new SubtitleParseError(
          `Failed to parse VTT subtitles: ${error instanceof Error ? error.message : String(error)}`,
          videoId
        );
      }

      return vttCuesToRawCues(cues);
    },
  };
}

// ============================================================================
// Steps
// ============================================================================

/**
 * Build the yt-dlp arguments for a metadata-only subtitle query.
 */
export function buildYtDlpArgs(videoId: string, languages: readonly string[]): string[] {
  return [
    '--dump-single-json',
    '--skip-download',
    '--write-subs',
    '--write-auto-subs',
    '--sub-langs',
    languages.join(','),
    '--sub-format',
    'vtt',
    '--no-warnings',
    buildWatchUrl(videoId),
  ];
}

async function extractInfo(
  videoId: string,
  languages: readonly string[],
  binary: string,
  run: ProcessRunner,
  timeoutMs: number
): Promise<YtDlpInfo> {
  let stdout: string;
  try {
    ({ stdout } = await run(binary, buildYtDlpArgs(videoId, languages), { timeoutMs }));
  } catch (error) {
    throw new TranscriptFetchError(
      `yt-dlp failed: ${error instanceof Error ? error.message : String(error)}`,
      videoId,
      YTDLP_SOURCE_NAME
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch {
    throw new TranscriptFetchError('yt-dlp returned invalid JSON', videoId, YTDLP_SOURCE_NAME);
  }

  const parsed = YtDlpInfoSchema.safeParse(json);
  if (!parsed.success) {
    throw new TranscriptFetchError(
      `yt-dlp returned unexpected metadata: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
      videoId,
      YTDLP_SOURCE_NAME
    );
  }
  return parsed.data;
}

/**
 * Pick the subtitle URL for the first preferred language.
 *
 * Only the first non-empty mapping is consulted, and the search stops at
 * the first preferred language present in it, even if that entry has no
 * URL. Unrequested languages are never picked.
 *
 * @returns The subtitle URL, or null when none is resolvable
 */
export function selectSubtitleUrl(info: YtDlpInfo, languages: readonly string[]): string | null {
  const mapping = [info.requested_subtitles, info.automatic_captions, info.subtitles].find(
    (candidate) => candidate && Object.keys(candidate).length > 0
  );
  if (!mapping) {
    return null;
  }

  for (const lang of languages) {
    if (!Object.hasOwn(mapping, lang)) {
      continue;
    }
    const entry = mapping[lang];
    const chosen = Array.isArray(entry) ? pickListEntry(entry) : entry;
    return chosen?.url ?? null;
  }

  return null;
}

/**
 * From a list of formats, prefer the VTT one, else the first.
 */
function pickListEntry(entries: SubtitleEntry[]): SubtitleEntry | undefined {
  return entries.find((entry) => entry.ext === 'vtt') ?? entries[0];
}

async function downloadSubtitles(
  url: string,
  videoId: string,
  fetchFn: FetchFn,
  timeoutMs: number
): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchFn(url, { signal: controller.signal });
    if (!response.ok) {
      throw new SubtitleDownloadError(
        `Subtitle download failed: ${response.status}`,
        videoId,
        response.status
      );
    }
    return await response.text();
  } catch (error) {
    if (error instanceof SubtitleDownloadError) {
      throw error;
    }
    if (error instanceof Error && error.name === 'AbortError') {
      throw new SubtitleDownloadError(
        `Subtitle download timed out after ${timeoutMs}ms`,
        videoId,
        408
      );
    }
    throw new SubtitleDownloadError(
      `Subtitle download failed: ${error instanceof Error ? error.message : String(error)}`,
      videoId,
      0
    );
  } finally {
    clearTimeout(timeoutId);
  }
}
