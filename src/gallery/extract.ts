/**
 * Photo extraction from a rendered gallery document
 *
 * Each gallery item is an `a.photo-item` anchor carrying `data-photo-id` and,
 * somewhere inside it, a `div#photoJSON_<id>` holding the item's metadata:
 *
 *   <a class="photo-item" data-photo-id="123">
 *     <div id="photoJSON_123">{"photo":{"photo_img_og":"https:\/\/..."}}</div>
 *   </a>
 */

import * as cheerio from 'cheerio';
import { normalizeRemoteUrl } from '../utils/url.js';
import type { ExtractionResult, PhotoRecord, SkippedItem } from './types.js';

export const PHOTO_ITEM_SELECTOR = 'a.photo-item';
export const PHOTO_ID_ATTRIBUTE = 'data-photo-id';
export const PHOTO_JSON_SELECTOR = 'div[id^="photoJSON_"]';

/** Path segments of brewery and beer logo assets, which are not user photos */
export const LOGO_PATH_SEGMENTS = ['beer_logos', 'brewery_logos'] as const;

export function isLogoAsset(url: string): boolean {
  return LOGO_PATH_SEGMENTS.some((segment) => url.includes(segment));
}

type ParsedItem = { ok: true; imageUrl: string } | { ok: false; skip: Omit<SkippedItem, 'id'> };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the original-resolution image URL out of one item's metadata blob
 */
export function parsePhotoMetadata(json: string): ParsedItem {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, skip: { reason: 'invalid-json', detail: message } };
  }

  const photo = isRecord(data) ? data.photo : undefined;
  const rawUrl = isRecord(photo) ? photo.photo_img_og : undefined;
  if (typeof rawUrl !== 'string' || rawUrl.trim() === '') {
    return { ok: false, skip: { reason: 'missing-image-url' } };
  }

  const normalized = normalizeRemoteUrl(rawUrl);
  if (!normalized.ok) {
    return { ok: false, skip: { reason: 'invalid-url', detail: `${normalized.reason} (input: ${normalized.input})` } };
  }

  if (isLogoAsset(normalized.url)) {
    return { ok: false, skip: { reason: 'logo-asset', detail: normalized.url } };
  }

  return { ok: true, imageUrl: normalized.url };
}

/**
 * Scan a whole document for photo items whose id is not yet in `seenIds`
 *
 * Items come back in document order. An id repeated within the document is
 * reported once. Items that fail to parse are listed in `skipped` and are not
 * treated as seen, so a later pass may still pick them up.
 */
export function extractPhotoRecords(html: string, seenIds: ReadonlySet<string>): ExtractionResult {
  const $ = cheerio.load(html);
  const records: PhotoRecord[] = [];
  const skipped: SkippedItem[] = [];
  const scanned = new Set<string>();

  $(PHOTO_ITEM_SELECTOR).each((_, element) => {
    const item = $(element);
    const id = item.attr(PHOTO_ID_ATTRIBUTE)?.trim();
    if (!id || seenIds.has(id) || scanned.has(id)) {
      return;
    }
    scanned.add(id);

    const json = item.find(PHOTO_JSON_SELECTOR).first().text().trim();
    if (!json) {
      skipped.push({ id, reason: 'missing-metadata' });
      return;
    }

    const parsed = parsePhotoMetadata(json);
    if (!parsed.ok) {
      skipped.push({ id, ...parsed.skip });
      return;
    }

    records.push({ id, imageUrl: parsed.imageUrl });
  });

  return { records, skipped };
}
