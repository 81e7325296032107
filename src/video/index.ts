/**
 * Video Module
 *
 * @module video
 */

export { extractVideoId, buildWatchUrl } from './video-id.js';
