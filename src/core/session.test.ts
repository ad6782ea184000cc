import { jest } from '@jest/globals';
import { chromium } from 'playwright';
import { createGallerySession, DEFAULT_USER_AGENT, LAUNCH_ARGS } from './session';
import { PlaywrightGalleryPage } from './playwright-page';

const setupBrowserMocks = () => {
  const closePage = jest.fn<() => Promise<void>>().mockResolvedValue(undefined);
  const closeContext = jest.fn<() => Promise<void>>().mockResolvedValue(undefined);
  const closeBrowser = jest.fn<() => Promise<void>>().mockResolvedValue(undefined);

  const mockPage = { close: closePage };
  const mockContext = {
    newPage: jest.fn<() => Promise<typeof mockPage>>().mockResolvedValue(mockPage),
    close: closeContext,
  };
  const mockBrowser = {
    newContext: jest.fn<() => Promise<typeof mockContext>>().mockResolvedValue(mockContext),
    close: closeBrowser,
  };

  const launchSpy = jest
    .spyOn(chromium, 'launch')
    .mockResolvedValue(mockBrowser as never);

  return {
    launchSpy,
    mockBrowser,
    mockContext,
    mockPage,
    closeBrowser,
    closeContext,
    closePage,
  };
};

describe('createGallerySession', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('launches headful with sandbox-safe flags and closes resources once', async () => {
    const { launchSpy, mockBrowser, closeBrowser, closeContext, closePage } = setupBrowserMocks();

    const session = await createGallerySession();

    expect(launchSpy).toHaveBeenCalledWith({
      headless: false,
      args: ['--no-sandbox', '--disable-dev-shm-usage'],
      handleSIGINT: false,
    });
    expect(mockBrowser.newContext).toHaveBeenCalledWith({ userAgent: DEFAULT_USER_AGENT });
    expect(session.galleryPage).toBeInstanceOf(PlaywrightGalleryPage);

    await session.close();
    await session.close();

    expect(closePage).toHaveBeenCalledTimes(1);
    expect(closeContext).toHaveBeenCalledTimes(1);
    expect(closeBrowser).toHaveBeenCalledTimes(1);
  });

  it('passes headless and user agent options through', async () => {
    const { launchSpy, mockBrowser } = setupBrowserMocks();

    await createGallerySession({ headless: true, userAgent: 'Agent' });

    expect(launchSpy).toHaveBeenCalledWith({ headless: true, args: LAUNCH_ARGS, handleSIGINT: false });
    expect(mockBrowser.newContext).toHaveBeenCalledWith({ userAgent: 'Agent' });
  });

  it('closes browser on setup failure', async () => {
    const { mockContext, closeBrowser, closeContext, closePage } = setupBrowserMocks();

    mockContext.newPage.mockRejectedValueOnce(new Error('boom'));

    await expect(createGallerySession()).rejects.toThrow('boom');

    expect(closePage).not.toHaveBeenCalled();
    expect(closeContext).toHaveBeenCalledTimes(1);
    expect(closeBrowser).toHaveBeenCalledTimes(1);
  });

  it('still closes the browser when closing the page fails', async () => {
    const { closePage, closeBrowser } = setupBrowserMocks();
    closePage.mockRejectedValueOnce(new Error('target closed'));

    const session = await createGallerySession();
    await session.close();

    expect(closeBrowser).toHaveBeenCalledTimes(1);
  });
});
