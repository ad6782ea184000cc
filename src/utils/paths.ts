/**
 * Path utilities and naming policy for output layout
 * Files are numbered by their position in the crawl, not by the site's photo id,
 * so a re-run against the same gallery maps each photo to the same name.
 */

import { join } from 'path';

/**
 * Canonical output layout
 */
export const OUTPUT_LAYOUT = {
  /** Destination directory prefix, followed by the username */
  DIR_PREFIX: 'photos_',
  /** Photo filename prefix */
  FILE_PREFIX: 'photo_',
  /** Zero-padding width of the sequence number */
  SEQUENCE_WIDTH: 4,
  /** Extension of every saved photo */
  EXTENSION: 'jpg',
  /** Suffix of the file a download streams into before it is renamed */
  PARTIAL_SUFFIX: '.part',
  /** Default credential file */
  CREDENTIALS_FILE: 'creds.txt',
} as const;

/**
 * Get the destination directory for a user's photos
 * @param outRoot - Directory that holds the per-user folders
 * @param username - Untappd username
 * @returns Full path to photos_<username>
 */
export function getDestinationDir(outRoot: string, username: string): string {
  const dirname = `${OUTPUT_LAYOUT.DIR_PREFIX}${username}`;
  if (!isValidFilename(dirname)) {
    throw new RangeError(`Unsafe directory name: ${dirname}`);
  }
  return join(outRoot, dirname);
}

/**
 * Generate the filename for the photo at a 1-based position
 * @param position - 1-based position in crawl order
 * @returns e.g. "photo_0007.jpg"; positions wider than the padding keep all digits
 */
export function generatePhotoFilename(position: number): string {
  if (!Number.isInteger(position) || position < 1) {
    throw new RangeError(`Photo position must be a positive integer, got ${position}`);
  }
  const sequence = String(position).padStart(OUTPUT_LAYOUT.SEQUENCE_WIDTH, '0');
  return `${OUTPUT_LAYOUT.FILE_PREFIX}${sequence}.${OUTPUT_LAYOUT.EXTENSION}`;
}

export function getPhotoPath(destinationDir: string, filename: string): string {
  return join(destinationDir, filename);
}

export function getPartialPath(localPath: string): string {
  return `${localPath}${OUTPUT_LAYOUT.PARTIAL_SUFFIX}`;
}

/**
 * Validate that a filename is safe and within constraints
 * @param filename - Filename to validate
 * @returns true if filename is safe
 */
export function isValidFilename(filename: string): boolean {
  // Check length (filesystem limit is typically 255)
  if (filename.length === 0 || filename.length > 255) {
    return false;
  }

  // Check for unsafe characters
  if (!/^[a-z0-9._-]+$/i.test(filename)) {
    return false;
  }

  // Disallow path traversal
  if (filename.includes('..')) {
    return false;
  }

  return true;
}
