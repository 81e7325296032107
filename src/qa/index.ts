/**
 * QA Module
 *
 * @module qa
 */

export {
  answerQuestion,
  getTimestampedChunks,
  createQaService,
  type QaService,
  type QaAnswer,
  type QaServiceOverrides,
  type QaDependencies,
  type RetrievalDependencies,
  type TimestampedTranscript,
  type ChunkRequestOptions,
} from './pipeline.js';
