import { createGallerySession } from '../core/session.js';
import { SessionError } from '../utils/errors.js';
import { sleep } from '../utils/ratelimit.js';
import { extractPhotoRecords } from './extract.js';
import { activateLoadMore, DEFAULT_LOAD_MORE_STRATEGIES } from './load-more.js';
import { getGalleryUrl, LOGIN_URL } from './url.js';
import type {
  CrawlEvent,
  CrawlOptions,
  CrawlResult,
  GalleryPage,
  GallerySessionHandle,
  PaginationOptions,
  PaginationResult,
  PhotoRecord,
  StopReason,
} from './types.js';

export const DEFAULT_MAX_LOAD_MORE_ATTEMPTS = 100;

export const SIGN_IN_PROMPT = 'Sign in (and pass any CAPTCHA) in the browser window, then press Enter to continue: ';

interface PaginationState {
  photos: PhotoRecord[];
  seenIds: Set<string>;
  /** Ids already reported as skipped; they stay out of seenIds so a later pass can still pick them up */
  reportedSkips: Set<string>;
  loadMoreAttempts: number;
  pass: number;
}

/**
 * Collect every photo the gallery reveals by activating "Show More" until it stops
 *
 * The whole document is re-scanned on every pass; the seen-id set alone keeps a
 * photo from being counted twice, even when the page re-renders older items.
 */
export async function paginateGallery(
  page: GalleryPage,
  options: PaginationOptions = {}
): Promise<PaginationResult> {
  const opts = {
    maxPhotos: options.maxPhotos,
    maxLoadMoreAttempts: options.maxLoadMoreAttempts ?? DEFAULT_MAX_LOAD_MORE_ATTEMPTS,
    scrollSettleMs: options.scrollSettleMs ?? 1000,
    loadMoreSettleMs: options.loadMoreSettleMs ?? 5000,
    strategies: options.strategies ?? DEFAULT_LOAD_MORE_STRATEGIES,
  };
  const { signal } = options;
  const emit = (event: CrawlEvent): void => options.onEvent?.(event);

  const state: PaginationState = {
    photos: [],
    seenIds: new Set<string>(),
    reportedSkips: new Set<string>(),
    loadMoreAttempts: 0,
    pass: 0,
  };

  const stop = (reason: StopReason, detail?: string): PaginationResult => {
    emit({ type: 'stopped', reason, total: state.photos.length, detail });
    return {
      photos: state.photos,
      loadMoreAttempts: state.loadMoreAttempts,
      stopReason: reason,
    };
  };

  for (;;) {
    signal?.throwIfAborted();
    state.pass++;

    const { records, skipped } = extractPhotoRecords(await page.html(), state.seenIds);
    for (const record of records) {
      state.seenIds.add(record.id);
      state.photos.push(record);
    }
    for (const item of skipped) {
      if (!state.reportedSkips.has(item.id)) {
        state.reportedSkips.add(item.id);
        emit({ type: 'item-skipped', item });
      }
    }
    emit({ type: 'page-scanned', pass: state.pass, added: records.length, total: state.photos.length });

    if (opts.maxPhotos !== undefined && state.photos.length >= opts.maxPhotos) {
      state.photos = state.photos.slice(0, opts.maxPhotos);
      return stop('max-photos');
    }

    if (state.loadMoreAttempts >= opts.maxLoadMoreAttempts) {
      return stop('attempt-limit');
    }

    try {
      await page.scrollToBottom();
    } catch (error) {
      return stop('advance-failed', error instanceof Error ? error.message : String(error));
    }
    await sleep(opts.scrollSettleMs, signal);

    const strategy = await activateLoadMore(page, opts.strategies, options.onEvent);
    if (!strategy) {
      return stop('exhausted');
    }

    state.loadMoreAttempts++;
    emit({ type: 'load-more', attempt: state.loadMoreAttempts, strategy });
    await sleep(opts.loadMoreSettleMs, signal);
  }
}

/**
 * Full crawl: launch the browser, wait for the operator to sign in, open the
 * gallery and paginate through it. The session is closed on every exit path.
 */
export async function crawlGallery(username: string, options: CrawlOptions): Promise<CrawlResult> {
  const emit = (event: CrawlEvent): void => options.onEvent?.(event);
  const createSession = options.sessionFactory ?? createGallerySession;
  const galleryUrl = getGalleryUrl(username);
  const { signal } = options;

  signal?.throwIfAborted();
  emit({ type: 'phase', phase: 'launch' });

  let session: GallerySessionHandle;
  try {
    session = await createSession({
      headless: options.headless,
      userAgent: options.userAgent,
      navigationTimeout: options.navigationTimeout,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw SessionError.fromLaunchFailure(message);
  }

  try {
    emit({ type: 'phase', phase: 'await-auth' });
    await session.galleryPage.open(LOGIN_URL);
    await options.awaitOperatorSignal(SIGN_IN_PROMPT, signal);
    signal?.throwIfAborted();

    emit({ type: 'phase', phase: 'navigate' });
    await session.galleryPage.open(galleryUrl);
    await sleep(options.navigationSettleMs ?? 3000, signal);

    emit({ type: 'phase', phase: 'paginate' });
    const result = await paginateGallery(session.galleryPage, options);

    return {
      username,
      galleryUrl,
      ...result,
    };
  } finally {
    emit({ type: 'phase', phase: 'teardown' });
    await session.close();
  }
}
