/**
 * Transcript Retrieval Tests
 *
 * Tests the primary youtube-transcript source, VTT parsing, the yt-dlp
 * fallback source and the fetcher's fallback policy. All external
 * collaborators (lookup, process runner, HTTP) are injected fakes.
 */

import { describe, it, expect, jest } from '@jest/globals';
import {
  createPrimarySource,
  classifyLookupError,
  segmentsToCues,
  createCaptionFormatRecorder,
  type TranscriptLookupFn,
  type TranscriptSegmentResponse,
} from './primary.js';
import {
  createYtDlpSource,
  selectSubtitleUrl,
  buildYtDlpArgs,
  type ProcessRunner,
  type YtDlpInfo,
} from './ytdlp.js';
import { parseVtt, vttTimestampToSeconds, vttCuesToRawCues, VttSyntaxError } from './vtt.js';
import { fetchTranscript } from './fetcher.js';
import { cleanCaptionText } from './text.js';
import {
  SubtitlesUnavailableError,
  VideoUnavailableError,
  TranscriptFetchError,
  NoSubtitlesAvailableError,
  SubtitleDownloadError,
  SubtitleParseError,
  describeLanguages,
  isDefinitiveTranscriptError,
  isTranscriptPipelineError,
} from './errors.js';
import { chunkCues } from '../chunking/index.js';
import type { Logger } from '../logger.js';
import type { TranscriptSource } from './types.js';

// ============================================================================
// Test Data
// ============================================================================

const VIDEO_ID = 'abcDEF12345';
const LANGUAGES = ['es', 'en'] as const;

const SEGMENTS: TranscriptSegmentResponse[] = [
  { text: ' Hola &amp;#39;mundo&amp;#39; ', offset: 1.5, duration: 2.25 },
  { text: '\n', offset: 3.75, duration: 1 },
  { text: 'adiós', offset: 4, duration: 1 },
];

const SAMPLE_VTT = [
  'WEBVTT',
  'Kind: captions',
  'Language: es',
  '',
  'NOTE generated for tests',
  '',
  '1',
  '00:00:01.000 --> 00:00:04.500 align:start position:0%',
  'Hola a',
  '<c>todos</c>',
  '',
  '00:04.500 --> 00:07.250',
  'segunda línea',
  '',
  '00:00:07.250 --> 00:00:08.000',
  ' ',
  '',
].join('\n');

const SUBTITLE_URL = 'https://subs.example.test/es.vtt';

type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;
type GlobalFetch = typeof fetch;

const SRV3_BODY =
  '<?xml version="1.0" encoding="utf-8" ?><timedtext format="3"><body>' +
  '<p t="1500" d="2000">Hola</p><p t="3500" d="2500">mundo</p>' +
  '</body></timedtext>';

const CLASSIC_BODY =
  '<?xml version="1.0" encoding="utf-8" ?><transcript>' +
  '<text start="1.5" dur="2">Hola</text><text start="3.5" dur="2.5">mundo</text>' +
  '</transcript>';

/**
 * Lookup that downloads captions through the supplied fetch and parses
 * either caption format, reporting times in the body's own unit.
 */
const captionBodyLookup: TranscriptLookupFn = async (videoId, config) => {
  const fetchCaptions = config?.fetch ?? globalThis.fetch;
  const response = await fetchCaptions(`https://www.youtube.com/api/timedtext?v=${videoId}`);
  const body = await response.text();

  const srv3 = [...body.matchAll(/<p t="(\d+)" d="(\d+)">([^<]*)<\/p>/g)];
  if (srv3.length > 0) {
    return srv3.map((match) => ({
      text: match[3],
      offset: Number(match[1]),
      duration: Number(match[2]),
    }));
  }
  return [...body.matchAll(/<text start="([^"]*)" dur="([^"]*)">([^<]*)<\/text>/g)].map(
    (match) => ({
      text: match[3],
      offset: parseFloat(match[1]),
      duration: parseFloat(match[2]),
    })
  );
};

function createMockLogger(): Logger {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

function createFakeSource(name: string) {
  const fetchCues = jest.fn<TranscriptSource['fetchCues']>();
  const source: TranscriptSource = { name, fetchCues };
  return { source, fetchCues };
}

function infoJson(info: YtDlpInfo): string {
  return JSON.stringify({ id: VIDEO_ID, title: 'Test video', ...info });
}

// ============================================================================
// Text Cleaning
// ============================================================================

describe('cleanCaptionText', () => {
  it('should decode double-encoded entities', () => {
    expect(cleanCaptionText('it&amp;#39;s &amp;quot;fine&amp;quot;')).toBe('it\'s "fine"');
  });

  it('should strip inline tags and collapse newlines', () => {
    expect(cleanCaptionText('<i>first</i>\nsecond<00:00:01.200><c> third</c>  ')).toBe(
      'first second third'
    );
  });
});

// ============================================================================
// Primary Source
// ============================================================================

describe('Primary Source', () => {
  describe('segmentsToCues', () => {
    it('should compute end times and clean text', () => {
      expect(segmentsToCues(SEGMENTS)).toEqual([
        { start: 1.5, end: 3.75, text: "Hola 'mundo'" },
        { start: 4, end: 5, text: 'adiós' },
      ]);
    });
  });

  describe('segmentsToCues units', () => {
    it('should convert millisecond segments to seconds', () => {
      expect(
        segmentsToCues([{ text: 'Hola', offset: 1500, duration: 2000 }], 'milliseconds')
      ).toEqual([{ start: 1.5, end: 3.5, text: 'Hola' }]);
    });
  });

  describe('createCaptionFormatRecorder', () => {
    it('should default to seconds', () => {
      expect(createCaptionFormatRecorder(jest.fn<GlobalFetch>()).unit()).toBe('seconds');
    });

    it('should record srv3 bodies as milliseconds', async () => {
      const recorder = createCaptionFormatRecorder(
        jest.fn<GlobalFetch>().mockResolvedValue(new Response(SRV3_BODY))
      );

      const response = await recorder.fetch('https://www.youtube.com/api/timedtext');

      expect(recorder.unit()).toBe('milliseconds');
      expect(await response.text()).toBe(SRV3_BODY);
    });

    it('should let the last caption body decide the unit', async () => {
      const recorder = createCaptionFormatRecorder(
        jest
          .fn<GlobalFetch>()
          .mockResolvedValueOnce(new Response(SRV3_BODY))
          .mockResolvedValueOnce(new Response('{"captions": {}}'))
          .mockResolvedValueOnce(new Response(CLASSIC_BODY))
      );

      await recorder.fetch('https://www.youtube.com/api/timedtext?fmt=srv3');
      await recorder.fetch('https://www.youtube.com/youtubei/v1/player');
      expect(recorder.unit()).toBe('milliseconds');

      await recorder.fetch('https://www.youtube.com/api/timedtext');
      expect(recorder.unit()).toBe('seconds');
    });

    it('should ignore failed responses', async () => {
      const recorder = createCaptionFormatRecorder(
        jest.fn<GlobalFetch>().mockResolvedValue(new Response(SRV3_BODY, { status: 429 }))
      );

      await recorder.fetch('https://www.youtube.com/api/timedtext');

      expect(recorder.unit()).toBe('seconds');
    });
  });

  describe('caption time units', () => {
    it('should read srv3 captions as milliseconds', async () => {
      const fetchFn = jest.fn<GlobalFetch>().mockResolvedValue(new Response(SRV3_BODY));
      const source = createPrimarySource({ lookup: captionBodyLookup, fetchFn });

      const cues = await source.fetchCues(VIDEO_ID, LANGUAGES);

      expect(cues).toEqual([
        { start: 1.5, end: 3.5, text: 'Hola' },
        { start: 3.5, end: 6, text: 'mundo' },
      ]);
      expect(chunkCues(cues)).toEqual([
        { tsRange: '[00:00:01.500–00:00:06.000]', text: 'Hola mundo' },
      ]);
    });

    it('should read classic captions as seconds', async () => {
      const fetchFn = jest.fn<GlobalFetch>().mockResolvedValue(new Response(CLASSIC_BODY));
      const source = createPrimarySource({ lookup: captionBodyLookup, fetchFn });

      const cues = await source.fetchCues(VIDEO_ID, LANGUAGES);

      expect(cues).toEqual([
        { start: 1.5, end: 3.5, text: 'Hola' },
        { start: 3.5, end: 6, text: 'mundo' },
      ]);
    });

    it('should keep the unit separate for each language attempt', async () => {
      const fetchFn = jest
        .fn<GlobalFetch>()
        .mockResolvedValueOnce(
          new Response('<timedtext format="3"><body><p t="100" d="200"> </p></body></timedtext>')
        )
        .mockResolvedValueOnce(new Response(CLASSIC_BODY));
      const lookup = jest.fn<TranscriptLookupFn>(captionBodyLookup);
      const source = createPrimarySource({ lookup, fetchFn });

      const cues = await source.fetchCues(VIDEO_ID, LANGUAGES);

      expect(lookup).toHaveBeenCalledTimes(2);
      expect(cues[0]).toEqual({ start: 1.5, end: 3.5, text: 'Hola' });
    });
  });

  describe('classifyLookupError', () => {
    it('should classify youtube-transcript messages', () => {
      expect(
        classifyLookupError(new Error('[YoutubeTranscript] Transcript is disabled on this video (x)'))
      ).toBe('disabled');
      expect(
        classifyLookupError(new Error('No transcripts are available for this video (x)'))
      ).toBe('not-found');
      expect(
        classifyLookupError(
          new Error('No transcripts are available in es this video (x). Available languages: en')
        )
      ).toBe('language-missing');
      expect(classifyLookupError(new Error('The video is no longer available (x)'))).toBe(
        'video-unavailable'
      );
      expect(classifyLookupError(new Error('fetch failed'))).toBe('other');
      expect(classifyLookupError('boom')).toBe('other');
    });
  });

  describe('fetchCues', () => {
    it('should return cues for the first preferred language', async () => {
      const lookup = jest.fn<TranscriptLookupFn>().mockResolvedValue(SEGMENTS);
      const source = createPrimarySource({ lookup });

      const cues = await source.fetchCues(VIDEO_ID, LANGUAGES);

      expect(source.name).toBe('youtube-transcript');
      expect(cues).toHaveLength(2);
      expect(lookup).toHaveBeenCalledTimes(1);
      expect(lookup).toHaveBeenCalledWith(VIDEO_ID, expect.objectContaining({ lang: 'es' }));
    });

    it('should move to the next language when one is missing', async () => {
      const lookup = jest
        .fn<TranscriptLookupFn>()
        .mockRejectedValueOnce(
          new Error('No transcripts are available in es this video (x). Available languages: en')
        )
        .mockResolvedValueOnce([{ text: 'hello', offset: 0, duration: 2 }]);
      const source = createPrimarySource({ lookup });

      const cues = await source.fetchCues(VIDEO_ID, LANGUAGES);

      expect(cues).toEqual([{ start: 0, end: 2, text: 'hello' }]);
      expect(lookup).toHaveBeenNthCalledWith(2, VIDEO_ID, expect.objectContaining({ lang: 'en' }));
    });

    it('should move to the next language when a transcript is empty', async () => {
      const lookup = jest
        .fn<TranscriptLookupFn>()
        .mockResolvedValueOnce([])
        .mockResolvedValueOnce([{ text: 'hello', offset: 0, duration: 2 }]);
      const source = createPrimarySource({ lookup });

      await expect(source.fetchCues(VIDEO_ID, LANGUAGES)).resolves.toHaveLength(1);
    });

    it('should fail with SubtitlesUnavailableError when no language has a transcript', async () => {
      const lookup = jest
        .fn<TranscriptLookupFn>()
        .mockRejectedValue(new Error('No transcripts are available in xx this video (x)'));
      const source = createPrimarySource({ lookup });

      const promise = source.fetchCues(VIDEO_ID, LANGUAGES);
      await expect(promise).rejects.toBeInstanceOf(SubtitlesUnavailableError);
      await expect(promise).rejects.toThrow('No subtitles available in Spanish/English');
      expect(lookup).toHaveBeenCalledTimes(2);
    });

    it('should fail immediately when transcripts are disabled', async () => {
      const lookup = jest
        .fn<TranscriptLookupFn>()
        .mockRejectedValue(new Error('Transcript is disabled on this video (x)'));
      const source = createPrimarySource({ lookup });

      await expect(source.fetchCues(VIDEO_ID, LANGUAGES)).rejects.toBeInstanceOf(
        SubtitlesUnavailableError
      );
      expect(lookup).toHaveBeenCalledTimes(1);
    });

    it('should fail with SubtitlesUnavailableError when no transcript is found', async () => {
      const lookup = jest
        .fn<TranscriptLookupFn>()
        .mockRejectedValue(new Error('No transcripts are available for this video (x)'));
      const source = createPrimarySource({ lookup });

      await expect(source.fetchCues(VIDEO_ID, LANGUAGES)).rejects.toBeInstanceOf(
        SubtitlesUnavailableError
      );
    });

    it('should fail with VideoUnavailableError for unavailable videos', async () => {
      const lookup = jest
        .fn<TranscriptLookupFn>()
        .mockRejectedValue(new Error('The video is no longer available (x)'));
      const source = createPrimarySource({ lookup });

      const promise = source.fetchCues(VIDEO_ID, LANGUAGES);
      await expect(promise).rejects.toBeInstanceOf(VideoUnavailableError);
      await expect(promise).rejects.toThrow(`Video ${VIDEO_ID} is not available`);
    });

    it('should wrap other failures in TranscriptFetchError', async () => {
      const lookup = jest
        .fn<TranscriptLookupFn>()
        .mockRejectedValue(new Error('YouTube is receiving too many requests from this IP'));
      const source = createPrimarySource({ lookup });

      const promise = source.fetchCues(VIDEO_ID, LANGUAGES);
      await expect(promise).rejects.toBeInstanceOf(TranscriptFetchError);
      await expect(promise).rejects.toMatchObject({
        source: 'youtube-transcript',
        videoId: VIDEO_ID,
      });
    });

    it('should time out slow lookups', async () => {
      const lookup = jest
        .fn<TranscriptLookupFn>()
        .mockImplementation(() => new Promise<TranscriptSegmentResponse[]>(() => undefined));
      const source = createPrimarySource({ lookup, timeoutMs: 10 });

      const promise = source.fetchCues(VIDEO_ID, LANGUAGES);
      await expect(promise).rejects.toBeInstanceOf(TranscriptFetchError);
      await expect(promise).rejects.toThrow('Transcript lookup timed out after 10ms');
    });
  });
});

// ============================================================================
// VTT Parsing
// ============================================================================

describe('VTT Parsing', () => {
  describe('parseVtt', () => {
    it('should parse cues with identifiers, settings and multi-line payloads', () => {
      expect(parseVtt(SAMPLE_VTT)).toEqual([
        {
          identifier: '1',
          start: '00:00:01.000',
          end: '00:00:04.500',
          text: 'Hola a\n<c>todos</c>',
        },
        { start: '00:04.500', end: '00:07.250', text: 'segunda línea' },
        { start: '00:00:07.250', end: '00:00:08.000', text: '' },
      ]);
    });

    it('should accept a byte order mark and CRLF line endings', () => {
      const input = '\uFEFFWEBVTT\r\n\r\n00:00:00.000 --> 00:00:01.000\r\nhi\r\n';
      expect(parseVtt(input)).toEqual([{ start: '00:00:00.000', end: '00:00:01.000', text: 'hi' }]);
    });

    it('should return no cues for a header-only file', () => {
      expect(parseVtt('WEBVTT\n')).toEqual([]);
    });

    it('should reject input without a WEBVTT signature', () => {
      expect(() => parseVtt('1\n00:00:01.000 --> 00:00:02.000\nhi')).toThrow(
        'Missing WEBVTT signature (line 1)'
      );
    });

    it('should reject malformed timing lines', () => {
      expect(() => parseVtt('WEBVTT\n\n00:00:01 --> 00:00:02\nhi')).toThrow(VttSyntaxError);
      expect(() => parseVtt('WEBVTT\n\n00:00:01 --> 00:00:02\nhi')).toThrow(
        'Malformed cue timing "00:00:01 --> 00:00:02" (line 3)'
      );
    });
  });

  describe('vttTimestampToSeconds', () => {
    it('should convert hour and minute forms', () => {
      expect(vttTimestampToSeconds('01:02:05.250')).toBe(3725.25);
      expect(vttTimestampToSeconds('1:00:00.000')).toBe(3600);
      expect(vttTimestampToSeconds('02:05.250')).toBe(125.25);
    });

    it('should reject non-numeric timestamps', () => {
      expect(() => vttTimestampToSeconds('ab:cd')).toThrow('Invalid VTT timestamp: ab:cd');
    });
  });

  describe('vttCuesToRawCues', () => {
    it('should convert times, collapse newlines and drop empty cues', () => {
      expect(vttCuesToRawCues(parseVtt(SAMPLE_VTT))).toEqual([
        { start: 1, end: 4.5, text: 'Hola a todos' },
        { start: 4.5, end: 7.25, text: 'segunda línea' },
      ]);
    });
  });
});

// ============================================================================
// yt-dlp Fallback Source
// ============================================================================

describe('yt-dlp Source', () => {
  describe('buildYtDlpArgs', () => {
    it('should request subtitle metadata without downloading media', () => {
      expect(buildYtDlpArgs(VIDEO_ID, LANGUAGES)).toEqual([
        '--dump-single-json',
        '--skip-download',
        '--write-subs',
        '--write-auto-subs',
        '--sub-langs',
        'es,en',
        '--sub-format',
        'vtt',
        '--no-warnings',
        `https://www.youtube.com/watch?v=${VIDEO_ID}`,
      ]);
    });
  });

  describe('selectSubtitleUrl', () => {
    it('should use requested subtitles before automatic captions', () => {
      const info: YtDlpInfo = {
        requested_subtitles: { en: { url: 'https://subs.example.test/en.vtt', ext: 'vtt' } },
        automatic_captions: { es: [{ url: 'https://subs.example.test/auto-es.vtt', ext: 'vtt' }] },
      };
      expect(selectSubtitleUrl(info, LANGUAGES)).toBe('https://subs.example.test/en.vtt');
    });

    it('should fall through empty mappings and prefer the first language', () => {
      const info: YtDlpInfo = {
        requested_subtitles: null,
        automatic_captions: {
          en: [{ url: 'en-vtt', ext: 'vtt' }],
          es: [
            { url: 'es-json3', ext: 'json3' },
            { url: 'es-vtt', ext: 'vtt' },
          ],
        },
        subtitles: { es: [{ url: 'manual-es', ext: 'vtt' }] },
      };
      expect(selectSubtitleUrl(info, LANGUAGES)).toBe('es-vtt');
    });

    it('should take the first list element when none is VTT', () => {
      const info: YtDlpInfo = {
        subtitles: {
          en: [
            { url: 'en-srv3', ext: 'srv3' },
            { url: 'en-json3', ext: 'json3' },
          ],
        },
      };
      expect(selectSubtitleUrl(info, LANGUAGES)).toBe('en-srv3');
    });

    it('should never pick an unrequested language', () => {
      const info: YtDlpInfo = { requested_subtitles: { fr: { url: 'fr-vtt', ext: 'vtt' } } };
      expect(selectSubtitleUrl(info, LANGUAGES)).toBeNull();
    });

    it('should stop at the first preferred language even without a URL', () => {
      const info: YtDlpInfo = {
        requested_subtitles: { es: { ext: 'vtt' }, en: { url: 'en-vtt', ext: 'vtt' } },
      };
      expect(selectSubtitleUrl(info, LANGUAGES)).toBeNull();
    });

    it('should return null when every mapping is empty', () => {
      expect(selectSubtitleUrl({ requested_subtitles: {}, subtitles: {} }, LANGUAGES)).toBeNull();
    });
  });

  describe('fetchCues', () => {
    it('should extract, download and parse subtitles', async () => {
      const run = jest.fn<ProcessRunner>().mockResolvedValue({
        stdout: infoJson({ requested_subtitles: { es: { url: SUBTITLE_URL, ext: 'vtt' } } }),
      });
      const fetchFn = jest.fn<FetchFn>().mockResolvedValue(new Response(SAMPLE_VTT));
      const source = createYtDlpSource({ run, fetchFn });

      const cues = await source.fetchCues(VIDEO_ID, LANGUAGES);

      expect(source.name).toBe('yt-dlp');
      expect(cues).toEqual([
        { start: 1, end: 4.5, text: 'Hola a todos' },
        { start: 4.5, end: 7.25, text: 'segunda línea' },
      ]);
      expect(run).toHaveBeenCalledWith('yt-dlp', buildYtDlpArgs(VIDEO_ID, LANGUAGES), {
        timeoutMs: 60000,
      });
      expect(fetchFn).toHaveBeenCalledWith(
        SUBTITLE_URL,
        expect.objectContaining({ signal: expect.any(AbortSignal) })
      );
    });

    it('should use the configured binary', async () => {
      const run = jest.fn<ProcessRunner>().mockResolvedValue({
        stdout: infoJson({ requested_subtitles: { es: { url: SUBTITLE_URL } } }),
      });
      const fetchFn = jest.fn<FetchFn>().mockResolvedValue(new Response('WEBVTT\n'));
      const source = createYtDlpSource({ run, fetchFn, binary: '/opt/yt-dlp' });

      await expect(source.fetchCues(VIDEO_ID, LANGUAGES)).resolves.toEqual([]);
      expect(run.mock.calls[0][0]).toBe('/opt/yt-dlp');
    });

    it('should fail with NoSubtitlesAvailableError when no URL resolves', async () => {
      const run = jest.fn<ProcessRunner>().mockResolvedValue({ stdout: infoJson({}) });
      const fetchFn = jest.fn<FetchFn>();
      const source = createYtDlpSource({ run, fetchFn });

      await expect(source.fetchCues(VIDEO_ID, LANGUAGES)).rejects.toBeInstanceOf(
        NoSubtitlesAvailableError
      );
      expect(fetchFn).not.toHaveBeenCalled();
    });

    it('should fail with SubtitleDownloadError on non-success status', async () => {
      const run = jest.fn<ProcessRunner>().mockResolvedValue({
        stdout: infoJson({ requested_subtitles: { es: { url: SUBTITLE_URL } } }),
      });
      const fetchFn = jest
        .fn<FetchFn>()
        .mockResolvedValue(new Response('gone', { status: 404 }));
      const source = createYtDlpSource({ run, fetchFn });

      const promise = source.fetchCues(VIDEO_ID, LANGUAGES);
      await expect(promise).rejects.toBeInstanceOf(SubtitleDownloadError);
      await expect(promise).rejects.toMatchObject({ statusCode: 404 });
    });

    it('should fail with SubtitleDownloadError on network errors', async () => {
      const run = jest.fn<ProcessRunner>().mockResolvedValue({
        stdout: infoJson({ requested_subtitles: { es: { url: SUBTITLE_URL } } }),
      });
      const fetchFn = jest.fn<FetchFn>().mockRejectedValue(new TypeError('fetch failed'));
      const source = createYtDlpSource({ run, fetchFn });

      await expect(source.fetchCues(VIDEO_ID, LANGUAGES)).rejects.toMatchObject({
        name: 'SubtitleDownloadError',
        statusCode: 0,
        message: 'Subtitle download failed: fetch failed',
      });
    });

    it('should fail with SubtitleParseError on invalid VTT', async () => {
      const run = jest.fn<ProcessRunner>().mockResolvedValue({
        stdout: infoJson({ requested_subtitles: { es: { url: SUBTITLE_URL } } }),
      });
      const fetchFn = jest.fn<FetchFn>().mockResolvedValue(new Response('{"events": []}'));
      const source = createYtDlpSource({ run, fetchFn });

      const promise = source.fetchCues(VIDEO_ID, LANGUAGES);
      await expect(promise).rejects.toBeInstanceOf(SubtitleParseError);
      await expect(promise).rejects.toThrow(
        'Failed to parse VTT subtitles: Missing WEBVTT signature (line 1)'
      );
    });

    it('should fail with TranscriptFetchError when yt-dlp fails', async () => {
      const run = jest.fn<ProcessRunner>().mockRejectedValue(new Error('spawn yt-dlp ENOENT'));
      const source = createYtDlpSource({ run, fetchFn: jest.fn<FetchFn>() });

      await expect(source.fetchCues(VIDEO_ID, LANGUAGES)).rejects.toMatchObject({
        name: 'TranscriptFetchError',
        source: 'yt-dlp',
        message: 'yt-dlp failed: spawn yt-dlp ENOENT',
      });
    });

    it('should fail with TranscriptFetchError on invalid JSON output', async () => {
      const run = jest.fn<ProcessRunner>().mockResolvedValue({ stdout: 'ERROR: not json' });
      const source = createYtDlpSource({ run, fetchFn: jest.fn<FetchFn>() });

      await expect(source.fetchCues(VIDEO_ID, LANGUAGES)).rejects.toThrow(
        'yt-dlp returned invalid JSON'
      );
    });
  });
});

// ============================================================================
// Fetcher
// ============================================================================

describe('fetchTranscript', () => {
  const cues = [{ start: 0, end: 5, text: 'Hola' }];

  it('should return the primary source result without touching the fallback', async () => {
    const primary = createFakeSource('primary');
    const fallback = createFakeSource('fallback');
    primary.fetchCues.mockResolvedValue(cues);

    const result = await fetchTranscript(VIDEO_ID, LANGUAGES, [primary.source, fallback.source]);

    expect(result).toEqual({ videoId: VIDEO_ID, source: 'primary', cues });
    expect(primary.fetchCues).toHaveBeenCalledWith(VIDEO_ID, LANGUAGES);
    expect(fallback.fetchCues).not.toHaveBeenCalled();
  });

  it('should fall back on TranscriptFetchError', async () => {
    const primary = createFakeSource('primary');
    const fallback = createFakeSource('fallback');
    const logger = createMockLogger();
    primary.fetchCues.mockRejectedValue(new TranscriptFetchError('rate limited', VIDEO_ID, 'primary'));
    fallback.fetchCues.mockResolvedValue(cues);

    const result = await fetchTranscript(
      VIDEO_ID,
      LANGUAGES,
      [primary.source, fallback.source],
      logger
    );

    expect(result.source).toBe('fallback');
    expect(logger.warn).toHaveBeenCalledWith(
      '[transcript] primary failed (rate limited), falling back to fallback'
    );
  });

  it('should not fall back when no transcript is found', async () => {
    const primary = createFakeSource('primary');
    const fallback = createFakeSource('fallback');
    primary.fetchCues.mockRejectedValue(new SubtitlesUnavailableError(VIDEO_ID, LANGUAGES));

    await expect(
      fetchTranscript(VIDEO_ID, LANGUAGES, [primary.source, fallback.source])
    ).rejects.toBeInstanceOf(SubtitlesUnavailableError);
    expect(fallback.fetchCues).not.toHaveBeenCalled();
  });

  it('should not fall back when the video is unavailable', async () => {
    const primary = createFakeSource('primary');
    const fallback = createFakeSource('fallback');
    primary.fetchCues.mockRejectedValue(new VideoUnavailableError(VIDEO_ID));

    await expect(
      fetchTranscript(VIDEO_ID, LANGUAGES, [primary.source, fallback.source])
    ).rejects.toBeInstanceOf(VideoUnavailableError);
    expect(fallback.fetchCues).not.toHaveBeenCalled();
  });

  it('should propagate the fallback error unchanged', async () => {
    const primary = createFakeSource('primary');
    const fallback = createFakeSource('fallback');
    const fallbackError = new NoSubtitlesAvailableError(VIDEO_ID, LANGUAGES);
    primary.fetchCues.mockRejectedValue(new TranscriptFetchError('timeout', VIDEO_ID, 'primary'));
    fallback.fetchCues.mockRejectedValue(fallbackError);

    await expect(
      fetchTranscript(VIDEO_ID, LANGUAGES, [primary.source, fallback.source])
    ).rejects.toBe(fallbackError);
  });

  it('should propagate the last non-definitive error', async () => {
    const primary = createFakeSource('primary');
    const fallback = createFakeSource('fallback');
    const lastError = new TranscriptFetchError('yt-dlp failed', VIDEO_ID, 'fallback');
    primary.fetchCues.mockRejectedValue(new TranscriptFetchError('timeout', VIDEO_ID, 'primary'));
    fallback.fetchCues.mockRejectedValue(lastError);

    await expect(
      fetchTranscript(VIDEO_ID, LANGUAGES, [primary.source, fallback.source])
    ).rejects.toBe(lastError);
  });

  it('should reject an empty source list', async () => {
    await expect(fetchTranscript(VIDEO_ID, LANGUAGES, [])).rejects.toThrow(
      'No transcript sources configured'
    );
  });
});

// ============================================================================
// Errors
// ============================================================================

describe('Transcript Errors', () => {
  it('should describe language lists', () => {
    expect(describeLanguages(['es', 'en'])).toBe('Spanish/English');
    expect(describeLanguages(['de', 'xx'])).toBe('German/xx');
    expect(describeLanguages([])).toBe('any language');
  });

  it('should treat only TranscriptFetchError as non-definitive', () => {
    expect(isDefinitiveTranscriptError(new TranscriptFetchError('x', VIDEO_ID, 'primary'))).toBe(
      false
    );
    expect(isDefinitiveTranscriptError(new SubtitlesUnavailableError(VIDEO_ID, LANGUAGES))).toBe(
      true
    );
    expect(isDefinitiveTranscriptError(new Error('unknown'))).toBe(true);
  });

  it('should recognise pipeline errors', () => {
    expect(isTranscriptPipelineError(new SubtitleParseError('bad', VIDEO_ID))).toBe(true);
    expect(isTranscriptPipelineError(new Error('bad'))).toBe(false);
  });
});
