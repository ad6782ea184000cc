/**
 * Sequential photo downloader
 * - Saves the photo at position n as photo_000n.jpg in the destination directory
 * - Skips files that already exist, so an interrupted run resumes where it stopped
 * - Streams each body into <file>.part and renames it once complete
 * - One attempt per photo; a failure is logged and the batch moves on
 * - Fixed politeness delay after every attempted download
 */

import { mkdir, open, rename, rm, stat } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { getLogger } from '../utils/logger.js';
import { DownloadError, isAbortError, isErrnoException } from '../utils/errors.js';
import { rateLimit } from '../utils/ratelimit.js';
import { generatePhotoFilename, getPartialPath, getPhotoPath } from '../utils/paths.js';
import { DEFAULT_USER_AGENT } from '../core/session.js';
import type { PhotoRecord } from '../gallery/types.js';

export type FetchLike = (
  url: string,
  init: { headers: Record<string, string>; signal?: AbortSignal }
) => Promise<Response>;

export interface DownloadOptions {
  /** Pause after each attempted download (ms), default 2000 */
  delayMs?: number;
  /** User-Agent header sent with each request */
  userAgent?: string;
  signal?: AbortSignal;
  /** HTTP client, the global fetch unless replaced */
  fetchImpl?: FetchLike;
}

export type DownloadOutcome = 'downloaded' | 'skipped' | 'failed';

export interface DownloadResult {
  record: PhotoRecord;
  /** 1-based position in crawl order */
  position: number;
  filename: string;
  localPath: string;
  outcome: DownloadOutcome;
  /** Error message (if failed) */
  error?: string;
  /** Bytes written (if downloaded) */
  sizeBytes?: number;
}

export interface DownloadStats {
  total: number;
  downloaded: number;
  skipped: number;
  failed: number;
}

const defaultFetch: FetchLike = (url, init) => fetch(url, init);

async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isErrnoException(error, 'ENOENT')) {
      return false;
    }
    throw error;
  }
}

async function settleQuietly(action: Promise<unknown>, what: string): Promise<void> {
  try {
    await action;
  } catch (error) {
    getLogger().debug(`Ignoring ${what} failure: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Write a response body to disk chunk by chunk
 * The body lands in a .part file first; the final name only ever holds a complete file.
 * On failure the body is cancelled and the .part file removed.
 */
async function streamToFile(response: Response, url: string, localPath: string): Promise<number> {
  if (!response.body) {
    throw DownloadError.fromEmptyBody(url);
  }

  const partialPath = getPartialPath(localPath);
  const reader = response.body.getReader();
  let handle: FileHandle | null = null;
  let sizeBytes = 0;

  try {
    handle = await open(partialPath, 'w');
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      await handle.write(value);
      sizeBytes += value.byteLength;
    }
    const completed = handle;
    handle = null;
    await completed.close();
  } catch (error) {
    await settleQuietly(reader.cancel(), 'response body cancel');
    if (handle) {
      await settleQuietly(handle.close(), 'partial file close');
    }
    await settleQuietly(rm(partialPath, { force: true }), 'partial file removal');
    throw error;
  }

  await rename(partialPath, localPath);
  return sizeBytes;
}

async function downloadFile(
  record: PhotoRecord,
  localPath: string,
  options: Required<Pick<DownloadOptions, 'userAgent' | 'fetchImpl'>> & { signal?: AbortSignal }
): Promise<number> {
  const response = await options.fetchImpl(record.imageUrl, {
    headers: { 'User-Agent': options.userAgent },
    signal: options.signal,
  });

  if (!response.ok) {
    if (response.body) {
      await settleQuietly(response.body.cancel(), 'response body cancel');
    }
    throw DownloadError.fromHttpStatus(response.status, response.statusText);
  }

  return streamToFile(response, record.imageUrl, localPath);
}

/**
 * Download photos in order into destinationDir
 * Returns one result per record and overall statistics
 */
export async function downloadPhotos(
  records: PhotoRecord[],
  destinationDir: string,
  options: DownloadOptions = {}
): Promise<{ results: DownloadResult[]; stats: DownloadStats }> {
  const logger = getLogger();
  const delayMs = options.delayMs ?? 2000;
  const requestOptions = {
    userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
    fetchImpl: options.fetchImpl ?? defaultFetch,
    signal: options.signal,
  };

  const results: DownloadResult[] = [];
  const stats: DownloadStats = {
    total: records.length,
    downloaded: 0,
    skipped: 0,
    failed: 0,
  };

  logger.phaseStart('Download');
  await mkdir(destinationDir, { recursive: true });
  logger.info(`Downloading ${records.length} photos to ${destinationDir}`);

  for (let i = 0; i < records.length; i++) {
    const record = records[i];
    const position = i + 1;
    const filename = generatePhotoFilename(position);
    const localPath = getPhotoPath(destinationDir, filename);

    const fail = (error: unknown): DownloadResult => {
      if (options.signal?.aborted || isAbortError(error)) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Failed to download photo ${position} (${filename}): ${message}`);
      return { record, position, filename, localPath, outcome: 'failed', error: message };
    };

    // A failed existence check counts against this photo only
    const existing = await fileExists(localPath).catch((error: unknown) => fail(error));

    let result: DownloadResult;
    if (existing === true) {
      logger.debug(`[${position}/${records.length}] Skipping (already exists): ${filename}`);
      result = { record, position, filename, localPath, outcome: 'skipped' };
    } else if (existing === false) {
      logger.debug(`[${position}/${records.length}] Downloading ${filename} from ${record.imageUrl}`);
      result = await rateLimit(
        async (): Promise<DownloadResult> => {
          try {
            const sizeBytes = await downloadFile(record, localPath, requestOptions);
            return { record, position, filename, localPath, outcome: 'downloaded', sizeBytes };
          } catch (error) {
            return fail(error);
          }
        },
        { delayMs, signal: options.signal }
      );
    } else {
      result = existing;
    }

    results.push(result);
    stats[result.outcome]++;

    logger.progress({
      phase: 'Download',
      current: position,
      total: records.length,
    });
  }

  logger.phaseComplete(
    'Download',
    `${stats.downloaded} downloaded, ${stats.skipped} skipped, ${stats.failed} failed`
  );

  return { results, stats };
}
