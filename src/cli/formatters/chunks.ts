/**
 * Chunk List Formatter
 *
 * @module cli/formatters/chunks
 */

import chalk from 'chalk';
import type { TimestampedTranscript } from '../../qa/index.js';

/**
 * Render a chunked transcript for the terminal, one chunk per line.
 *
 * @example
 * ```typescript
 * formatChunkList(transcript);
 * // ['[00:00:00.000–00:00:09.000] Hola mundo', ...]
 * ```
 */
export function formatChunkList(transcript: TimestampedTranscript): string[] {
  return transcript.chunks.map((chunk) => `${chalk.dim(chunk.tsRange)} ${chunk.text}`);
}
