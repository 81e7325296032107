/**
 * Video ID Extraction
 *
 * Turns user input (a bare video ID or a YouTube URL) into the canonical
 * 11-character video identifier.
 *
 * @module video/video-id
 */

/** Matches `v=<id>` (watch URLs) and `be/<id>` (youtu.be short links) */
const VIDEO_ID_PATTERN = /(?:v=|be\/)([\w-]{11})/;

/**
 * Extract a YouTube video ID from a URL or return the input as-is.
 *
 * Input that does not look like a watch or short link is assumed to
 * already be a bare ID, so this never fails.
 *
 * @example
 * ```typescript
 * extractVideoId('https://www.youtube.com/watch?v=dQw4w9WgXcQ&t=42'); // 'dQw4w9WgXcQ'
 * extractVideoId('https://youtu.be/dQw4w9WgXcQ');                     // 'dQw4w9WgXcQ'
 * extractVideoId('dQw4w9WgXcQ');                                      // 'dQw4w9WgXcQ'
 * ```
 */
export function extractVideoId(input: string): string {
  const match = input.match(VIDEO_ID_PATTERN);
  return match ? match[1] : input;
}

/**
 * Build the canonical watch URL for a video ID.
 */
export function buildWatchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${encodeURIComponent(videoId)}`;
}
