/**
 * WebVTT Parsing
 *
 * Parses WebVTT subtitle files into cue lists and converts them into
 * `RawCue`s. Only what caption tracks use is supported: the `WEBVTT`
 * signature, optional cue identifiers, timing lines with trailing cue
 * settings, multi-line payloads, and NOTE/STYLE/REGION blocks (skipped).
 *
 * @module transcript/vtt
 */

import { cleanCaptionText } from './text.js';
import type { RawCue } from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A cue as written in the file, timestamps still in text form
 */
export interface VttCue {
  /** Optional cue identifier line */
  identifier?: string;
  /** Start timestamp, e.g. "00:01:02.500" or "01:02.500" */
  start: string;
  /** End timestamp */
  end: string;
  /** Payload lines joined with "\n" */
  text: string;
}

/**
 * Raised when the input is not a well-formed WebVTT document
 */
export class VttSyntaxError extends Error {
  constructor(
    message: string,
    public readonly line: number
  ) {
    super(`${message} (line ${line})`);
    this.name = 'VttSyntaxError';
  }
}

// ============================================================================
// Constants
// ============================================================================

const TIMESTAMP = String.raw`(?:\d+:)?\d{2}:\d{2}\.\d{3}`;
const TIMING_LINE = new RegExp(`^(${TIMESTAMP})[ \\t]+-->[ \\t]+(${TIMESTAMP})(?:[ \\t]+.*)?$`);
const SKIPPED_BLOCKS = /^(NOTE|STYLE|REGION)(\s|$)/;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse a WebVTT document.
 *
 * @param input - File contents
 * @returns Cues in file order
 * @throws VttSyntaxError if the signature is missing or a timing line is malformed
 */
export function parseVtt(input: string): VttCue[] {
  const lines = input.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n').split('\n');

  if (!/^WEBVTT(?:[ \t].*)?$/.test(lines[0] ?? '')) {
    throw new VttSyntaxError('Missing WEBVTT signature', 1);
  }

  const cues: VttCue[] = [];
  let index = 1;

  // Header block runs until the first blank line
  while (index < lines.length && lines[index].trim() !== '') {
    index++;
  }

  while (index < lines.length) {
    // Skip blank separators
    if (lines[index].trim() === '') {
      index++;
      continue;
    }

    const blockStart = index;
    const block: string[] = [];
    while (index < lines.length && lines[index].trim() !== '') {
      block.push(lines[index]);
      index++;
    }

    if (SKIPPED_BLOCKS.test(block[0])) {
      continue;
    }

    const timingOffset = block[0].includes('-->') ? 0 : 1;
    const timingLine = block[timingOffset];
    if (timingLine === undefined || !timingLine.includes('-->')) {
      // Identifier without timing; nothing to emit
      continue;
    }

    const match = timingLine.trim().match(TIMING_LINE);
    if (!match) {
      throw new VttSyntaxError(
        `Malformed cue timing "${timingLine.trim()}"`,
        blockStart + timingOffset + 1
      );
    }

    cues.push({
      ...(timingOffset === 1 && { identifier: block[0].trim() }),
      start: match[1],
      end: match[2],
      text: block.slice(timingOffset + 1).join('\n'),
    });
  }

  return cues;
}

/**
 * Convert a colon-separated VTT timestamp to seconds.
 *
 * @example
 * vttTimestampToSeconds('01:02:05.250') // 3725.25
 * vttTimestampToSeconds('02:05.250')    // 125.25
 */
export function vttTimestampToSeconds(timestamp: string): number {
  const parts = timestamp.trim().split(':');
  const seconds = Number(parts[parts.length - 1]);
  const minutes = Number(parts.length >= 2 ? parts[parts.length - 2] : 0);
  const hours = Number(parts.length === 3 ? parts[0] : 0);

  if (parts.length > 3 || [hours, minutes, seconds].some((n) => !Number.isFinite(n))) {
    throw new Error(`Invalid VTT timestamp: ${timestamp}`);
  }

  return hours * 3600 + minutes * 60 + seconds;
}

/**
 * Convert parsed VTT cues to raw cues.
 *
 * Payload newlines collapse to spaces and inline tags are removed;
 * cues left without text are dropped.
 */
export function vttCuesToRawCues(cues: VttCue[]): RawCue[] {
  const result: RawCue[] = [];
  for (const cue of cues) {
    const text = cleanCaptionText(cue.text);
    if (!text) {
      continue;
    }
    result.push({
      start: vttTimestampToSeconds(cue.start),
      end: vttTimestampToSeconds(cue.end),
      text,
    });
  }
  return result;
}
