/**
 * "Show More" control discovery
 *
 * The gallery appends items when its "Show More" anchor is clicked. The markup
 * has moved around over time, so several independent ways of finding the
 * control are tried in order until one yields a visible, enabled element.
 */

import type { CrawlEventListener, GalleryPage, LoadMoreStrategy, PageControl } from './types.js';

/**
 * Locate the control with a CSS selector
 */
export class CssSelectorStrategy implements LoadMoreStrategy {
  constructor(
    readonly name: string,
    readonly selector: string
  ) {}

  async locate(page: GalleryPage): Promise<PageControl | null> {
    const control = await page.query(this.selector);
    if (!control) {
      return null;
    }
    return (await control.isActionable()) ? control : null;
  }
}

/**
 * Locate the control by a data attribute holding the action it triggers
 */
export class ActionAttributeStrategy extends CssSelectorStrategy {
  constructor(tag: string, attribute: string, action: string) {
    super(`${attribute}=${action}`, `${tag}[${attribute}=${JSON.stringify(action)}]`);
  }
}

export const DEFAULT_LOAD_MORE_STRATEGIES: readonly LoadMoreStrategy[] = [
  new CssSelectorStrategy('a.more_photos', 'a.more_photos'),
  new CssSelectorStrategy('a.yellow.button.more_photos', 'a.yellow.button.more_photos'),
  new ActionAttributeStrategy('a', 'data-href', ':photos/showmore'),
  new CssSelectorStrategy('.more_photos', '.more_photos'),
];

/**
 * Try each strategy in order and activate the first control found
 *
 * A strategy that throws while locating or activating is reported and the
 * next one is tried.
 *
 * @returns Name of the strategy whose control was activated, or null when none was
 */
export async function activateLoadMore(
  page: GalleryPage,
  strategies: readonly LoadMoreStrategy[],
  onEvent?: CrawlEventListener
): Promise<string | null> {
  for (const strategy of strategies) {
    try {
      const control = await strategy.locate(page);
      if (!control) {
        continue;
      }
      await control.activate();
      return strategy.name;
    } catch (error) {
      onEvent?.({
        type: 'strategy-failed',
        strategy: strategy.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return null;
}
