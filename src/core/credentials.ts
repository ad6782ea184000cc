import { readFile } from 'fs/promises';
import { ConfigurationError, isErrnoException } from '../utils/errors.js';

/**
 * Account credentials, held in memory only
 */
export interface Credentials {
  identity: string;
  secret: string;
}

/**
 * Read the credential file: email on the first non-empty line, password on the second
 * Blank lines and surrounding whitespace are ignored
 */
export async function loadCredentials(path: string): Promise<Credentials> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (isErrnoException(error, 'ENOENT')) {
      throw ConfigurationError.fromMissingFile(path);
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw ConfigurationError.fromUnreadableFile(path, reason);
  }

  const lines = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  if (lines.length !== 2) {
    throw ConfigurationError.fromMalformedFile(path, lines.length);
  }

  const [identity, secret] = lines;
  return { identity, secret };
}
