/**
 * Chunks Command
 *
 * Prints a video's transcript as the timestamped chunks the model sees.
 * Useful for checking subtitle retrieval and tuning chunk thresholds
 * without calling the completion API.
 *
 * @module cli/commands/chunks
 */

import type { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import type { CliDeps } from '../deps.js';
import { createSpinner, createSpinnerLogger, formatChunkList } from '../formatters/index.js';
import type { Logger } from '../../logger.js';
import type { QaService } from '../../qa/index.js';
import { parseLanguageList, parsePositiveInt, parsePositiveNumber } from './options.js';

export interface ChunksOptions {
  json?: boolean;
  maxSeconds?: number;
  maxChars?: number;
  lang?: string[];
}

/**
 * Retrieve and print the chunks.
 */
export async function runChunks(
  video: string,
  options: ChunksOptions,
  base: BaseCommand,
  createService: (logger: Logger) => QaService
): Promise<void> {
  const spinner = createSpinner('Fetching transcript...', {
    enabled: !base.isQuiet() && !options.json,
  });
  const service = createService(createSpinnerLogger(spinner, base.toLogger()));

  spinner.start();
  const transcript = await service
    .chunks(video, {
      languages: options.lang,
      maxSeconds: options.maxSeconds,
      maxChars: options.maxChars,
    })
    .catch((error: unknown) => {
      spinner.fail('Could not retrieve the transcript');
      throw error;
    });
  spinner.succeed(`${transcript.chunks.length} chunks from ${transcript.source}`);

  if (options.json) {
    base.json(transcript);
    return;
  }

  base.keyValue('Video', transcript.videoId);
  base.keyValue('Source', transcript.source);
  base.keyValue('Chunks', transcript.chunks.length);
  for (const line of formatChunkList(transcript)) {
    base.output(line);
  }
}

/**
 * Register the chunks command.
 */
export function registerChunksCommand(program: Command, deps: CliDeps): void {
  program
    .command('chunks <video>')
    .description('Print the timestamped transcript chunks of a video')
    .option('--json', 'Print chunks as JSON')
    .option('--max-seconds <seconds>', 'Maximum chunk span in seconds', parsePositiveNumber)
    .option('--max-chars <chars>', 'Maximum chunk length in characters', parsePositiveInt)
    .option('--lang <codes>', 'Preferred subtitle languages, comma-separated', parseLanguageList)
    .action(async (video: string, options: ChunksOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      try {
        const config = deps.loadConfig();
        await runChunks(video, options, base, (logger) => deps.createService(config, logger));
      } catch (error) {
        base.handleError(error);
      }
    });
}
