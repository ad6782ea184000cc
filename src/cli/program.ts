import { Command, InvalidArgumentError } from 'commander';
import { parseUsername } from '../gallery/url.js';
import { InvalidInputError } from '../utils/errors.js';
import { DEFAULT_MAX_LOAD_MORE_ATTEMPTS } from '../gallery/crawler.js';
import { OUTPUT_LAYOUT } from '../utils/paths.js';
import { getLogger } from '../utils/logger.js';
import type { CliAction } from './types.js';

export const MIN_TIMEOUT_MS = 1;
export const MAX_TIMEOUT_MS = 300000;
export const DEFAULT_TIMEOUT_MS = 90000;
export const DEFAULT_DELAY_MS = 2000;

function parseInteger(value: string, flag: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`${flag} must be an integer, got: ${value}`);
  }
  return parseInt(value, 10);
}

export function parsePositiveInteger(flag: string): (value: string) => number {
  return (value: string) => {
    const parsed = parseInteger(value, flag);
    if (parsed < 1) {
      throw new InvalidArgumentError(`${flag} must be at least 1, got: ${parsed}`);
    }
    return parsed;
  };
}

export function parseDelay(value: string): number {
  const parsed = parseInteger(value, '--delay-ms');
  if (parsed < 0) {
    throw new InvalidArgumentError(`--delay-ms must not be negative, got: ${parsed}`);
  }
  return parsed;
}

export function parseTimeout(value: string): number {
  const parsed = parseInteger(value, '--timeout-ms');

  if (parsed < MIN_TIMEOUT_MS) {
    throw new InvalidArgumentError(`--timeout-ms must be at least ${MIN_TIMEOUT_MS}ms, got: ${parsed}`);
  }

  if (parsed > MAX_TIMEOUT_MS) {
    getLogger().warn(
      `--timeout-ms ${parsed}ms exceeds maximum of ${MAX_TIMEOUT_MS}ms, capping to ${MAX_TIMEOUT_MS}ms`
    );
    return MAX_TIMEOUT_MS;
  }

  return parsed;
}

export function parseUsernameArgument(value: string): string {
  try {
    return parseUsername(value);
  } catch (error) {
    if (error instanceof InvalidInputError) {
      throw new InvalidArgumentError(error.message);
    }
    throw error;
  }
}

/**
 * Build the command; parsing and validation only, the action does the work
 */
export function createProgram(action: CliAction): Command {
  const program = new Command();

  program
    .name('untappd-backup')
    .description('Download every photo from an Untappd user gallery')
    .version('0.1.0')
    .argument('<username>', 'Untappd username whose gallery is saved', parseUsernameArgument)
    .option('--out-root <dir>', 'Parent directory of photos_<username>', '.')
    .option('--creds <file>', 'Credential file (email on line 1, password on line 2)', OUTPUT_LAYOUT.CREDENTIALS_FILE)
    .option('--max-photos <number>', 'Stop after this many photos (default: no limit)', parsePositiveInteger('--max-photos'))
    .option('--delay-ms <number>', 'Pause after each download in milliseconds', parseDelay, DEFAULT_DELAY_MS)
    .option(
      '--timeout-ms <number>',
      `Navigation timeout in milliseconds (max: ${MAX_TIMEOUT_MS})`,
      parseTimeout,
      DEFAULT_TIMEOUT_MS
    )
    .option(
      '--max-attempts <number>',
      'Maximum "Show More" activations',
      parsePositiveInteger('--max-attempts'),
      DEFAULT_MAX_LOAD_MORE_ATTEMPTS
    )
    .option('--headless', 'Run the browser without a window')
    .option('--verbose', 'Enable verbose logging')
    .action(action);

  return program;
}
