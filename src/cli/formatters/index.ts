/**
 * CLI Formatters
 *
 * @module cli/formatters
 */

export {
  ProgressSpinner,
  createSpinner,
  createSpinnerLogger,
  formatDuration,
  type SpinnerOptions,
} from './progress.js';

export { formatChunkList } from './chunks.js';
