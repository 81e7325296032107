/**
 * video-qa
 *
 * Answers questions about a YouTube video's spoken content: retrieves its
 * subtitles (youtube-transcript, falling back to yt-dlp), merges them into
 * timestamped chunks and asks an OpenAI-compatible completion endpoint.
 *
 * @example
 * ```typescript
 * import { createQaService, loadConfig } from 'video-qa';
 *
 * const service = createQaService(loadConfig());
 * const { answer } = await service.answer('https://youtu.be/dQw4w9WgXcQ', 'What is it about?');
 * ```
 *
 * @module video-qa
 */

export * from './config/index.js';
export * from './video/index.js';
export * from './transcript/index.js';
export * from './chunking/index.js';
export * from './prompt/index.js';
export * from './completion/index.js';
export * from './qa/index.js';
export * from './server/index.js';
export { silentLogger, createConsoleLogger, type Logger, type LogLevel } from './logger.js';
