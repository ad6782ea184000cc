/**
 * In-memory GalleryPage for tests
 * Serves one document per "Show More" activation, like a gallery that appends items
 */

import type { GalleryPage, PageControl } from './types.js';

export interface FakeGalleryPageOptions {
  /** Document served after 0, 1, 2... activations; the last one is served from then on */
  documents: string[];
  /** Selector the "Show More" control answers to */
  controlSelector?: string;
  /** Selectors whose lookup throws */
  failingSelectors?: string[];
  /** Selectors that match a control that is not visible */
  hiddenSelectors?: string[];
  /** Keep offering the control after the last document */
  endless?: boolean;
  /** Make activation throw */
  failActivation?: boolean;
  failScroll?: boolean;
}

export class FakeGalleryPage implements GalleryPage {
  readonly openedUrls: string[] = [];
  readonly queriedSelectors: string[] = [];
  activations = 0;
  scrolls = 0;
  htmlReads = 0;

  constructor(private readonly options: FakeGalleryPageOptions) {}

  async open(url: string): Promise<void> {
    this.openedUrls.push(url);
  }

  async html(): Promise<string> {
    this.htmlReads++;
    const { documents } = this.options;
    return documents[Math.min(this.activations, documents.length - 1)] ?? '';
  }

  async scrollToBottom(): Promise<void> {
    if (this.options.failScroll) {
      throw new Error('scroll failed');
    }
    this.scrolls++;
  }

  async query(selector: string): Promise<PageControl | null> {
    this.queriedSelectors.push(selector);

    if (this.options.failingSelectors?.includes(selector)) {
      throw new Error(`lookup failed for ${selector}`);
    }

    if (this.options.hiddenSelectors?.includes(selector)) {
      return {
        isActionable: async () => false,
        activate: async () => {
          throw new Error('hidden control activated');
        },
      };
    }

    if (selector !== (this.options.controlSelector ?? 'a.more_photos')) {
      return null;
    }

    const hasMore = this.options.endless || this.activations < this.options.documents.length - 1;
    if (!hasMore) {
      return null;
    }

    return {
      isActionable: async () => true,
      activate: async () => {
        if (this.options.failActivation) {
          throw new Error('click intercepted');
        }
        this.activations++;
      },
    };
  }
}

/**
 * Markup of one gallery item as the site renders it
 */
export function photoItemHtml(id: string, imageUrl: string): string {
  const json = JSON.stringify({ photo: { photo_id: Number(id), photo_img_og: imageUrl } });
  return `<a class="photo-item" data-photo-id="${id}"><div id="photoJSON_${id}">${json}</div></a>`;
}

/**
 * A gallery document listing photo items with image URLs under images.example.com
 */
export function galleryHtml(ids: string[]): string {
  const items = ids.map((id) => photoItemHtml(id, `https://images.example.com/photos/${id}.jpg`));
  return `<html><body><div class="photo-list">${items.join('')}</div></body></html>`;
}
