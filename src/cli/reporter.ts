/**
 * Turns crawl events into log lines
 */

import { getLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type { CrawlEvent, CrawlEventListener, CrawlPhase, StopReason } from '../gallery/types.js';

const PHASE_MESSAGES: Record<CrawlPhase, string> = {
  launch: 'Launching browser',
  'await-auth': 'Opened the sign-in page',
  navigate: 'Opening gallery',
  paginate: 'Collecting photos',
  teardown: 'Closing browser',
};

const STOP_MESSAGES: Record<StopReason, string> = {
  'max-photos': 'photo limit reached',
  exhausted: 'no more "Show More" button',
  'attempt-limit': '"Show More" attempt limit reached',
  'advance-failed': 'page could not be advanced',
};

export function describeStopReason(reason: StopReason): string {
  return STOP_MESSAGES[reason];
}

export function createCrawlReporter(logger: Logger = getLogger()): CrawlEventListener {
  return (event: CrawlEvent) => {
    switch (event.type) {
      case 'phase':
        if (event.phase === 'teardown') {
          logger.debug(PHASE_MESSAGES.teardown);
        } else {
          logger.info(PHASE_MESSAGES[event.phase]);
        }
        break;
      case 'page-scanned':
        logger.debug(`Pass ${event.pass}: ${event.added} new photos (${event.total} total)`);
        break;
      case 'item-skipped': {
        const { id, reason, detail } = event.item;
        const message = detail ? `Skipped photo ${id}: ${reason} (${detail})` : `Skipped photo ${id}: ${reason}`;
        if (reason === 'logo-asset') {
          logger.debug(message);
        } else {
          logger.warn(message);
        }
        break;
      }
      case 'strategy-failed':
        logger.debug(`"Show More" lookup ${event.strategy} failed: ${event.error}`);
        break;
      case 'load-more':
        logger.debug(`Clicked "Show More" (${event.attempt}) via ${event.strategy}`);
        break;
      case 'stopped':
        if (event.reason === 'advance-failed' && event.detail) {
          logger.warn(`Could not advance the gallery: ${event.detail}`);
        }
        logger.phaseComplete('Discovery', `${event.total} photos, ${describeStopReason(event.reason)}`);
        break;
    }
  };
}
