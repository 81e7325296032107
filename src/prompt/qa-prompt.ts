/**
 * Question-Answering Prompt
 *
 * Renders timestamped transcript chunks and a user question into the
 * single user message sent to the completion model.
 *
 * @module prompt/qa-prompt
 */

import type { Chunk } from '../chunking/index.js';

/**
 * Render one chunk as `<tsRange> <text>`.
 */
export function formatChunkLine(chunk: Chunk): string {
  return `${chunk.tsRange} ${chunk.text}`;
}

/**
 * Build the prompt for answering a question about a video.
 *
 * The question is embedded verbatim. With no chunks the transcript
 * section is simply empty; the result is never blank.
 *
 * @param chunks - Timestamped transcript blocks, in order
 * @param question - The user's question
 * @returns Trimmed prompt text ending in `Answer:`
 *
 * @example
 * ```typescript
 * const prompt = buildQaPrompt(
 *   [{ tsRange: '[00:00:00.000–00:00:09.000]', text: 'Hola mundo' }],
 *   '¿Qué dice al principio?'
 * );
 * ```
 */
export function buildQaPrompt(chunks: readonly Chunk[], question: string): string {
  const lines = chunks.map(formatChunkLine).join('\n');

  return `
You will receive the segmented transcript of a YouTube video, as blocks of text with their time range:
${lines}

A user will then ask a specific question about the content of the video.
Your task is to:
  - Read the blocks with their timestamps.
  - Identify the relevant parts.
  - Answer clearly, precisely and simply, citing timestamps when they add value.
  - When citing a timestamp, refer to the minute and second, for example "at minute 7 second 24 it is mentioned that...".
  - The transcript may come from automatic captions: allow for misspellings, words confused with similar-sounding ones and near-matches of the terms in the question.
User question:
${question}

Answer:
`.trim();
}
