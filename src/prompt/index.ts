/**
 * Prompt Module
 *
 * @module prompt
 */

export { buildQaPrompt, formatChunkLine } from './qa-prompt.js';
