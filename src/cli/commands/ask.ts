/**
 * Ask Command
 *
 * Answers a question about a video from the command line.
 *
 * @module cli/commands/ask
 */

import type { Command } from 'commander';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import type { CliDeps } from '../deps.js';
import { createSpinner, createSpinnerLogger } from '../formatters/index.js';
import type { Logger } from '../../logger.js';
import type { QaAnswer, QaService } from '../../qa/index.js';

// ============================================================================
// Types
// ============================================================================

export interface AskOptions {
  /** Print `{ videoId, answer }` as JSON */
  json?: boolean;
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Run the pipeline and print the answer.
 *
 * @throws Whatever the pipeline raises, after stopping the spinner
 */
export async function runAsk(
  video: string,
  question: string,
  options: AskOptions,
  base: BaseCommand,
  createService: (logger: Logger) => QaService
): Promise<void> {
  const spinner = createSpinner('Fetching transcript...', {
    enabled: !base.isQuiet() && !options.json,
  });
  const service = createService(createSpinnerLogger(spinner, base.toLogger()));

  spinner.start();
  let result: QaAnswer;
  try {
    result = await service.answer(video, question);
  } catch (error) {
    spinner.fail('Could not answer the question');
    throw error;
  }
  spinner.succeed('Answer ready');

  if (options.json) {
    base.json(result);
    return;
  }
  base.output(result.answer);
}

/**
 * Register the ask command.
 */
export function registerAskCommand(program: Command, deps: CliDeps): void {
  program
    .command('ask <video> <question>')
    .description('Answer a question about a YouTube video (ID or URL)')
    .option('--json', 'Print the answer as JSON')
    .action(async (video: string, question: string, options: AskOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      try {
        const config = deps.loadConfig();
        await runAsk(video, question, options, base, (logger) =>
          deps.createService(config, logger)
        );
      } catch (error) {
        base.handleError(error);
      }
    });
}
