import { jest } from '@jest/globals';
import { createCrawlReporter, describeStopReason } from './reporter';
import { Logger } from '../utils/logger';

describe('createCrawlReporter', () => {
  let logSpy: jest.SpiedFunction<typeof console.log>;
  let warnSpy: jest.SpiedFunction<typeof console.warn>;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const lines = () => logSpy.mock.calls.map((call) => call[0]);

  it('should announce phases and keep teardown for verbose mode', () => {
    const report = createCrawlReporter(new Logger());

    report({ type: 'phase', phase: 'launch' });
    report({ type: 'phase', phase: 'await-auth' });
    report({ type: 'phase', phase: 'teardown' });

    expect(lines()).toEqual([
      '[untappd-backup] Launching browser',
      '[untappd-backup] Opened the sign-in page',
    ]);
  });

  it('should print pass details only in verbose mode', () => {
    const quiet = createCrawlReporter(new Logger());
    quiet({ type: 'page-scanned', pass: 2, added: 12, total: 36 });
    quiet({ type: 'load-more', attempt: 3, strategy: 'a.more_photos' });
    expect(lines()).toEqual([]);

    const verbose = createCrawlReporter(new Logger({ verbose: true }));
    verbose({ type: 'page-scanned', pass: 2, added: 12, total: 36 });
    verbose({ type: 'load-more', attempt: 3, strategy: 'a.more_photos' });
    verbose({ type: 'strategy-failed', strategy: '.more_photos', error: 'detached' });

    expect(lines()).toEqual([
      '[untappd-backup] DEBUG: Pass 2: 12 new photos (36 total)',
      '[untappd-backup] DEBUG: Clicked "Show More" (3) via a.more_photos',
      '[untappd-backup] DEBUG: "Show More" lookup .more_photos failed: detached',
    ]);
  });

  it('should warn about malformed items but not about logos', () => {
    const report = createCrawlReporter(new Logger());

    report({ type: 'item-skipped', item: { id: '7', reason: 'invalid-json', detail: 'Unexpected token' } });
    report({ type: 'item-skipped', item: { id: '8', reason: 'logo-asset', detail: 'https://x/beer_logos/a.jpg' } });
    report({ type: 'item-skipped', item: { id: '9', reason: 'missing-image-url' } });

    expect(warnSpy.mock.calls.map((call) => call[0])).toEqual([
      '[untappd-backup] WARNING: Skipped photo 7: invalid-json (Unexpected token)',
      '[untappd-backup] WARNING: Skipped photo 9: missing-image-url',
    ]);
    expect(lines()).toEqual([]);
  });

  it('should summarise why discovery stopped', () => {
    const report = createCrawlReporter(new Logger());

    report({ type: 'stopped', reason: 'exhausted', total: 42 });
    report({ type: 'stopped', reason: 'advance-failed', total: 3, detail: 'page crashed' });

    expect(lines()).toEqual([
      '[untappd-backup] Discovery complete: 42 photos, no more "Show More" button',
      '[untappd-backup] Discovery complete: 3 photos, page could not be advanced',
    ]);
    expect(warnSpy).toHaveBeenCalledWith('[untappd-backup] WARNING: Could not advance the gallery: page crashed');
  });

  it('should describe every stop reason', () => {
    expect(describeStopReason('max-photos')).toBe('photo limit reached');
    expect(describeStopReason('attempt-limit')).toBe('"Show More" attempt limit reached');
  });
});
