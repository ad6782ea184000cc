import { getLogger } from '../utils/logger.js';
import { getDestinationDir, OUTPUT_LAYOUT } from '../utils/paths.js';
import { crawlGallery } from '../gallery/crawler.js';
import { downloadPhotos } from '../download/downloader.js';
import { loadCredentials } from './credentials.js';
import type { DownloadStats, FetchLike } from '../download/downloader.js';
import type {
  CrawlEventListener,
  GallerySessionFactory,
  OperatorSignal,
  StopReason,
} from '../gallery/types.js';

export interface BackupOptions {
  /** Parent directory of photos_<username>, default "." */
  outRoot?: string;
  /** Credential file, default creds.txt */
  credentialsPath?: string;
  maxPhotos?: number;
  /** Pause after each attempted download (ms) */
  delayMs?: number;
  /** Navigation timeout (ms) */
  timeoutMs?: number;
  maxLoadMoreAttempts?: number;
  headless?: boolean;
  /** Blocks until the operator confirms the sign-in */
  awaitOperatorSignal: OperatorSignal;
  onEvent?: CrawlEventListener;
  signal?: AbortSignal;
  sessionFactory?: GallerySessionFactory;
  fetchImpl?: FetchLike;
  navigationSettleMs?: number;
  scrollSettleMs?: number;
  loadMoreSettleMs?: number;
}

export interface BackupSummary {
  username: string;
  destination: string;
  discovered: number;
  loadMoreAttempts: number;
  stopReason: StopReason;
  downloads: DownloadStats;
}

/**
 * Run one backup: credentials, crawl, download, summary
 */
export async function orchestrateBackup(
  username: string,
  options: BackupOptions
): Promise<BackupSummary> {
  const logger = getLogger();
  const destination = getDestinationDir(options.outRoot ?? '.', username);

  // Validated up front; sign-in itself happens in the browser window
  await loadCredentials(options.credentialsPath ?? OUTPUT_LAYOUT.CREDENTIALS_FILE);

  logger.info(`Starting backup for ${username}`);

  const crawl = await crawlGallery(username, {
    awaitOperatorSignal: options.awaitOperatorSignal,
    onEvent: options.onEvent,
    signal: options.signal,
    sessionFactory: options.sessionFactory,
    headless: options.headless,
    navigationTimeout: options.timeoutMs,
    maxPhotos: options.maxPhotos,
    maxLoadMoreAttempts: options.maxLoadMoreAttempts,
    navigationSettleMs: options.navigationSettleMs,
    scrollSettleMs: options.scrollSettleMs,
    loadMoreSettleMs: options.loadMoreSettleMs,
  });

  const summary: BackupSummary = {
    username,
    destination,
    discovered: crawl.photos.length,
    loadMoreAttempts: crawl.loadMoreAttempts,
    stopReason: crawl.stopReason,
    downloads: { total: 0, downloaded: 0, skipped: 0, failed: 0 },
  };

  if (crawl.photos.length === 0) {
    logger.info('No photos found');
    return summary;
  }

  const { stats } = await downloadPhotos(crawl.photos, destination, {
    delayMs: options.delayMs,
    signal: options.signal,
    fetchImpl: options.fetchImpl,
  });
  summary.downloads = stats;

  logger.summary({
    discovered: {
      photos: summary.discovered,
      loadMoreAttempts: summary.loadMoreAttempts,
      stopReason: summary.stopReason,
    },
    downloads: stats,
    destination,
  });

  return summary;
}
