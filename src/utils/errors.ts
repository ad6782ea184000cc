/**
 * Error taxonomy for the backup run
 * Each error class extends Error and provides:
 * - kind: stable category used in operator-facing output
 * - message: user-friendly, actionable message
 * - details: optional verbose details
 *
 * Every failure kind maps to the generic failure exit code; the categories
 * only change what the operator is told.
 */

import { getLogger } from './logger.js';

export type ErrorKind = 'input' | 'configuration' | 'session' | 'download' | 'interrupted';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

/**
 * Base error class
 */
export abstract class PhotoBackupError extends Error {
  abstract readonly kind: ErrorKind;
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
    Object.setPrototypeOf(this, PhotoBackupError.prototype);
  }

  getExitCode(): number {
    return EXIT_FAILURE;
  }

  /**
   * Log error with appropriate level
   */
  log(): void {
    const logger = getLogger();
    logger.error(this.message);
    if (this.details) {
      logger.debug(`Details: ${this.details}`);
    }
  }
}

/**
 * Invalid input error
 * Triggered by: malformed username, invalid option values
 */
export class InvalidInputError extends PhotoBackupError {
  readonly kind = 'input';

  constructor(message: string, details?: string) {
    super(message, details);
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }

  static fromInvalidUsername(username: string): InvalidInputError {
    return new InvalidInputError(
      `Invalid Untappd username: "${username}"`,
      'Usernames may contain letters, digits, dots, underscores and hyphens'
    );
  }
}

/**
 * Configuration error
 * Triggered by: missing or malformed credential file
 */
export class ConfigurationError extends PhotoBackupError {
  readonly kind = 'configuration';

  constructor(message: string, details?: string) {
    super(message, details);
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }

  static fromMissingFile(path: string): ConfigurationError {
    return new ConfigurationError(
      `Credential file "${path}" not found. Create it with your email on line 1 and your password on line 2.`,
      'Pass a different location with --creds <file>'
    );
  }

  static fromMalformedFile(path: string, lineCount: number): ConfigurationError {
    return new ConfigurationError(
      `Credential file "${path}" must contain exactly 2 non-empty lines (email, password); found ${lineCount}.`,
      'Blank lines and surrounding whitespace are ignored'
    );
  }

  static fromUnreadableFile(path: string, reason: string): ConfigurationError {
    return new ConfigurationError(
      `Credential file "${path}" could not be read: ${reason}`,
      'Check the file permissions'
    );
  }
}

/**
 * Session error
 * Triggered by: browser launch or page creation failure
 */
export class SessionError extends PhotoBackupError {
  readonly kind = 'session';

  constructor(message: string, details?: string) {
    super(message, details);
    Object.setPrototypeOf(this, SessionError.prototype);
  }

  static fromLaunchFailure(reason: string): SessionError {
    return new SessionError(
      `Failed to start the browser session: ${reason}`,
      'Install a Chromium build for Playwright (npx playwright install chromium) and try again'
    );
  }
}

/**
 * Download error for a single photo
 * Contained by the fetcher: logged, recorded, and the batch continues
 */
export class DownloadError extends PhotoBackupError {
  readonly kind = 'download';
  readonly status?: number;

  constructor(message: string, details?: string, status?: number) {
    super(message, details);
    this.status = status;
    Object.setPrototypeOf(this, DownloadError.prototype);
  }

  static fromHttpStatus(status: number, statusText: string): DownloadError {
    const text = statusText ? `HTTP ${status}: ${statusText}` : `HTTP ${status}`;
    return new DownloadError(text, 'The image host rejected the request', status);
  }

  static fromEmptyBody(url: string): DownloadError {
    return new DownloadError(
      `Response for ${url} has no body`,
      'The image host returned an empty response'
    );
  }
}

/**
 * Operator-initiated cancellation (Ctrl-C)
 */
export class InterruptedError extends PhotoBackupError {
  readonly kind = 'interrupted';

  constructor(message: string = 'Interrupted by user') {
    super(message);
    Object.setPrototypeOf(this, InterruptedError.prototype);
  }

  log(): void {
    getLogger().warn(this.message);
  }
}

/**
 * True for the rejection an AbortSignal produces in timers, fetch and readline
 */
export function isAbortError(error: unknown): boolean {
  // DOMException from AbortSignal, or Node's own AbortError
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

/**
 * True for a filesystem error with the given code (e.g. ENOENT)
 */
export function isErrnoException(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

/**
 * Report an error to the operator and return the exit code to use
 * Unexpected errors are reported with their full stack trace
 */
export function reportError(error: unknown): number {
  if (error instanceof PhotoBackupError) {
    error.log();
    return error.getExitCode();
  }

  const logger = getLogger();
  if (error instanceof Error) {
    logger.error(`Unexpected error: ${error.message}`);
    if (error.stack) {
      logger.error(error.stack);
    }
  } else {
    logger.error(`Unexpected error: ${String(error)}`);
  }
  return EXIT_FAILURE;
}

/**
 * Report the error, then exit
 */
export function handleError(error: unknown): never {
  process.exit(reportError(error));
}
