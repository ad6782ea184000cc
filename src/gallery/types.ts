/**
 * Gallery crawl types: records, the page port the crawler drives, and the
 * event stream it reports through
 */

/**
 * One discovered photo
 */
export interface PhotoRecord {
  /** Site-assigned photo id (data-photo-id), the deduplication key */
  id: string;
  /** Absolute https URL of the original-resolution image */
  imageUrl: string;
}

export type SkipReason =
  | 'missing-metadata'
  | 'invalid-json'
  | 'missing-image-url'
  | 'invalid-url'
  | 'logo-asset';

/**
 * A gallery item that was found but did not become a record
 */
export interface SkippedItem {
  id: string;
  reason: SkipReason;
  detail?: string;
}

export interface ExtractionResult {
  records: PhotoRecord[];
  skipped: SkippedItem[];
}

export type StopReason = 'max-photos' | 'exhausted' | 'attempt-limit' | 'advance-failed';

export type CrawlPhase = 'launch' | 'await-auth' | 'navigate' | 'paginate' | 'teardown';

export type CrawlEvent =
  | { type: 'phase'; phase: CrawlPhase }
  | { type: 'page-scanned'; pass: number; added: number; total: number }
  | { type: 'item-skipped'; item: SkippedItem }
  | { type: 'strategy-failed'; strategy: string; error: string }
  | { type: 'load-more'; attempt: number; strategy: string }
  | { type: 'stopped'; reason: StopReason; total: number; detail?: string };

export type CrawlEventListener = (event: CrawlEvent) => void;

/**
 * An element on the rendered page that may be activated
 */
export interface PageControl {
  /** Visible and enabled */
  isActionable(): Promise<boolean>;
  /** Fire the control's click handler without pointer coordinates */
  activate(): Promise<void>;
}

/**
 * What the crawler needs from a rendering session
 */
export interface GalleryPage {
  open(url: string): Promise<void>;
  /** Serialized HTML of the whole rendered document */
  html(): Promise<string>;
  scrollToBottom(): Promise<void>;
  /** First element matching a CSS selector, or null */
  query(selector: string): Promise<PageControl | null>;
}

/**
 * One way of locating the "Show More" control
 */
export interface LoadMoreStrategy {
  readonly name: string;
  /** Resolve to an actionable control, or null when this strategy finds none */
  locate(page: GalleryPage): Promise<PageControl | null>;
}

/**
 * Blocks until the operator confirms sign-in
 */
export type OperatorSignal = (message: string, signal?: AbortSignal) => Promise<void>;

/**
 * Handle on a live rendering session
 */
export interface GallerySessionHandle {
  galleryPage: GalleryPage;
  close(): Promise<void>;
}

export interface GallerySessionOptions {
  headless?: boolean;
  userAgent?: string;
  navigationTimeout?: number;
}

export type GallerySessionFactory = (options: GallerySessionOptions) => Promise<GallerySessionHandle>;

/**
 * Options for the pagination loop
 */
export interface PaginationOptions {
  /**
   * Stop once this many records were collected
   * @default no limit
   */
  maxPhotos?: number;

  /**
   * Hard ceiling on "Show More" activations
   * @default 100
   */
  maxLoadMoreAttempts?: number;

  /**
   * Pause after scrolling to the bottom (ms)
   * @default 1000
   */
  scrollSettleMs?: number;

  /**
   * Pause after activating "Show More" (ms)
   * @default 5000
   */
  loadMoreSettleMs?: number;

  /**
   * Strategies tried in order on every pass
   * @default DEFAULT_LOAD_MORE_STRATEGIES
   */
  strategies?: readonly LoadMoreStrategy[];

  onEvent?: CrawlEventListener;
  signal?: AbortSignal;
}

export interface PaginationResult {
  photos: PhotoRecord[];
  loadMoreAttempts: number;
  stopReason: StopReason;
}

/**
 * Options for a full crawl, from browser launch to teardown
 */
export interface CrawlOptions extends PaginationOptions, GallerySessionOptions {
  awaitOperatorSignal: OperatorSignal;

  /**
   * Pause after the gallery page loads (ms)
   * @default 3000
   */
  navigationSettleMs?: number;

  sessionFactory?: GallerySessionFactory;
}

export interface CrawlResult extends PaginationResult {
  username: string;
  galleryUrl: string;
}
