/**
 * Cue Merging
 *
 * Greedy single-pass segmentation of caption cues into chunks bounded by
 * a maximum span and a maximum text length.
 *
 * A cue is appended to the current chunk unless doing so would make the
 * chunk span (`cue.end - chunk.start`) exceed `maxSeconds` or its joined
 * text (one space per join) exceed `maxChars`. A single cue that is
 * already over either limit still forms its own chunk; cues are never
 * split.
 *
 * @module chunking/merge
 */

import { z } from 'zod';
import type { RawCue } from '../transcript/types.js';
import { formatTimestampRange } from './timestamp.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A merged span of cues, before formatting
 */
export interface TimedChunk {
  /** Start of the first merged cue (seconds) */
  start: number;
  /** End of the last merged cue (seconds) */
  end: number;
  /** Space-joined cue texts */
  text: string;
  /** Number of cues merged into this chunk */
  cueCount: number;
}

/**
 * A chunk ready for the prompt
 */
export interface Chunk {
  /** `[HH:MM:SS.mmm–HH:MM:SS.mmm]` */
  readonly tsRange: string;
  readonly text: string;
}

export const ChunkOptionsSchema = z.object({
  maxSeconds: z.number().positive().default(30),
  maxChars: z.number().int().positive().default(500),
});

export type ChunkOptions = z.input<typeof ChunkOptionsSchema>;

// ============================================================================
// Main Functions
// ============================================================================

/**
 * Merge consecutive cues into time- and length-bounded chunks.
 *
 * @param cues - Cues in transcript order
 * @param options - Thresholds (defaults: 30 seconds, 500 characters)
 * @returns Chunks in input order; empty for empty input
 * @throws ZodError if a threshold is not positive
 *
 * @example
 * ```typescript
 * mergeCues([
 *   { start: 0, end: 4, text: 'Hola' },
 *   { start: 4, end: 9, text: 'mundo' },
 * ]);
 * // [{ start: 0, end: 9, text: 'Hola mundo', cueCount: 2 }]
 * ```
 */
export function mergeCues(cues: readonly RawCue[], options: ChunkOptions = {}): TimedChunk[] {
  const { maxSeconds, maxChars } = ChunkOptionsSchema.parse(options);
  const chunks: TimedChunk[] = [];
  let current: TimedChunk | undefined;

  for (const cue of cues) {
    const text = cue.text.trim();

    if (!current) {
      current = { start: cue.start, end: cue.end, text, cueCount: 1 };
      continue;
    }

    const duration = cue.end - current.start;
    const length = current.text.length + 1 + text.length;

    if (duration > maxSeconds || length > maxChars) {
      chunks.push(current);
      current = { start: cue.start, end: cue.end, text, cueCount: 1 };
    } else {
      current.end = cue.end;
      current.text = `${current.text} ${text}`;
      current.cueCount++;
    }
  }

  if (current) {
    chunks.push(current);
  }

  return chunks;
}

/**
 * Merge cues and format each chunk's span for the prompt.
 *
 * @example
 * ```typescript
 * chunkCues([{ start: 40, end: 45, text: 'adios' }]);
 * // [{ tsRange: '[00:00:40.000–00:00:45.000]', text: 'adios' }]
 * ```
 */
export function chunkCues(cues: readonly RawCue[], options: ChunkOptions = {}): Chunk[] {
  return mergeCues(cues, options).map(toChunk);
}

/**
 * Format a merged span as a prompt chunk
 */
export function toChunk(chunk: TimedChunk): Chunk {
  return {
    tsRange: formatTimestampRange(chunk.start, chunk.end),
    text: chunk.text,
  };
}
