import { chromium } from 'playwright';
import type { Browser, BrowserContext, Page } from 'playwright';
import { getLogger } from '../utils/logger.js';
import { PlaywrightGalleryPage } from './playwright-page.js';
import type { GalleryPage, GallerySessionHandle, GallerySessionOptions } from '../gallery/types.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const LAUNCH_ARGS = ['--no-sandbox', '--disable-dev-shm-usage'];

export interface GallerySession extends GallerySessionHandle {
  browser: Browser;
  context: BrowserContext;
  page: Page;
  galleryPage: GalleryPage;
  close: () => Promise<void>;
}

/**
 * Launch Chromium with a desktop user agent
 *
 * Headful by default: the operator signs in through the window. Playwright's
 * own SIGINT handler is turned off so Ctrl-C reaches the crawl, which closes
 * the session itself.
 */
export async function createGallerySession(
  options: GallerySessionOptions = {}
): Promise<GallerySession> {
  const logger = getLogger();
  const headless = options.headless ?? false;
  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;

  let browser: Browser | null = null;
  let context: BrowserContext | null = null;
  let page: Page | null = null;
  let closed = false;

  const closeQuietly = async (name: string, target: { close(): Promise<void> } | null) => {
    if (!target) return;
    try {
      await target.close();
    } catch (error) {
      logger.debug(`Ignoring ${name} close failure: ${error instanceof Error ? error.message : String(error)}`);
    }
  };

  const close = async () => {
    if (closed) return;
    closed = true;

    await closeQuietly('page', page);
    await closeQuietly('context', context);
    await closeQuietly('browser', browser);
  };

  try {
    browser = await chromium.launch({ headless, args: LAUNCH_ARGS, handleSIGINT: false });
    context = await browser.newContext({ userAgent });
    page = await context.newPage();

    return {
      browser,
      context,
      page,
      galleryPage: new PlaywrightGalleryPage(page, options.navigationTimeout),
      close,
    };
  } catch (error) {
    await close();
    throw error;
  }
}
