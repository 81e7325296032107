/**
 * Shared option parsers
 *
 * @module cli/commands/options
 */

import { InvalidArgumentError } from 'commander';

/**
 * Parse a positive number option (`--max-seconds 45`).
 */
export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return parsed;
}

/**
 * Parse a positive integer option (`--max-chars 800`, `--port 3000`).
 */
export function parsePositiveInt(value: string): number {
  const parsed = parsePositiveNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Parse a comma-separated list of language codes (`--lang en,fr`).
 */
export function parseLanguageList(value: string): string[] {
  const languages = value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
  if (languages.length === 0) {
    throw new InvalidArgumentError('List at least one language code.');
  }
  return languages;
}

/**
 * Parse a TCP port option.
 */
export function parsePort(value: string): number {
  const port = parsePositiveInt(value);
  if (port > 65535) {
    throw new InvalidArgumentError('Must be a port number between 1 and 65535.');
  }
  return port;
}
