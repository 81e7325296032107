/**
 * Chunking Module
 *
 * @module chunking
 */

export {
  mergeCues,
  chunkCues,
  toChunk,
  ChunkOptionsSchema,
  type TimedChunk,
  type Chunk,
  type ChunkOptions,
} from './merge.js';

export { secondsToTimestamp, formatTimestampRange, RANGE_SEPARATOR } from './timestamp.js';
