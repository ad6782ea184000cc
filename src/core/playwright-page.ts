/**
 * GalleryPage backed by a Playwright page
 */

import type { Locator, Page } from 'playwright';
import type { GalleryPage, PageControl } from '../gallery/types.js';

class LocatorControl implements PageControl {
  constructor(private readonly locator: Locator) {}

  async isActionable(): Promise<boolean> {
    return (await this.locator.isVisible()) && (await this.locator.isEnabled());
  }

  /**
   * Dispatch the click on the element itself; a pointer click at its
   * coordinates can land on an overlay instead
   */
  async activate(): Promise<void> {
    await this.locator.dispatchEvent('click');
  }
}

export class PlaywrightGalleryPage implements GalleryPage {
  constructor(
    private readonly page: Page,
    private readonly navigationTimeout: number = 90000
  ) {}

  async open(url: string): Promise<void> {
    const response = await this.page.goto(url, {
      timeout: this.navigationTimeout,
      waitUntil: 'domcontentloaded',
    });

    if (response && response.status() >= 400) {
      throw new Error(`HTTP ${response.status()}: Failed to load ${url}`);
    }
  }

  html(): Promise<string> {
    return this.page.content();
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate(() => {
      window.scrollTo(0, document.body.scrollHeight);
    });
  }

  async query(selector: string): Promise<PageControl | null> {
    const locator = this.page.locator(selector).first();
    if ((await locator.count()) === 0) {
      return null;
    }
    return new LocatorControl(locator);
  }
}
