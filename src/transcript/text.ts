/**
 * Caption Text Cleaning
 *
 * @module transcript/text
 */

/**
 * Clean caption text by decoding HTML entities, removing inline tags
 * and collapsing whitespace (including newlines) to single spaces.
 *
 * `&amp;` is decoded first so double-encoded entities such as
 * `&amp;#39;` (as served by the timedtext endpoint) come out right.
 *
 * @param text - Raw caption text
 * @returns Cleaned text
 */
export function cleanCaptionText(text: string): string {
  return (
    text
      // Decode common HTML entities
      .replace(/&amp;/g, '&')
      .replace(/&lt;/g, '<')
      .replace(/&gt;/g, '>')
      .replace(/&quot;/g, '"')
      .replace(/&#39;/g, "'")
      .replace(/&apos;/g, "'")
      .replace(/&#x27;/g, "'")
      .replace(/&nbsp;/g, ' ')
      // Remove inline tags (<c>, <i>, <00:00:01.000> karaoke timestamps...)
      .replace(/<[^>]*>/g, '')
      // Normalize whitespace
      .replace(/\s+/g, ' ')
      .trim()
  );
}
