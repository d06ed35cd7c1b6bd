// Marketplace Models
export type PlatformName = 'chrono24' | 'vestiaire' | 'catawiki';

export interface Listing {
  platform: PlatformName;
  listingId: string;
  title: string;
  price: number | null;
  currency: string;
  condition: string | null;
  country: string | null;
  imageUrl: string | null;
  url: string;
  /** First results page the listing was seen on during the run */
  seenAtPage: number;
}

export interface InventorySnapshot {
  platform: PlatformName;
  targetKey: string;
  snapshotDate: string;
  listings: Listing[];
}

// Crawl Types
export type TerminationReason =
  | 'page_limit_reached'
  | 'no_more_pages'
  | 'consecutive_failure_limit'
  | 'aborted';

export interface ScrapeRunResult {
  platform: PlatformName;
  targetKey: string;
  pagesAttempted: number;
  pagesSucceeded: number;
  pagesFailed: number;
  /** Page count advertised by the marketplace during the pre-scan, null when unknown */
  pagesTotalDetected: number | null;
  /** Item count advertised by the marketplace during the pre-scan, null when unknown */
  itemsTotalDetected: number | null;
  /** Listings extracted across all pages before deduplication */
  rawItemsExtracted: number;
  /** Deduplicated listing count */
  itemsCollected: number;
  consecutiveFailures: number;
  terminatedReason: TerminationReason;
  durationMs: number;
  error?: string;
}

export interface CrawlOutcome {
  result: ScrapeRunResult;
  listings: Listing[];
}

// Detection Types
export type ChangeKind = 'SOLD' | 'NEW' | 'UPDATED';

export interface ChangeEvent {
  kind: ChangeKind;
  platform: PlatformName;
  listingId: string;
  previousPrice: number | null;
  currentPrice: number | null;
}

export interface DetectedSale {
  platform: PlatformName;
  targetKey: string;
  listingId: string;
  detectionDate: string;
  lastSeenPrice: number | null;
  /** Confirmed sale price when the platform exposes one, else the last asking price */
  salePrice: number | null;
  currency: string;
  daysListed: number | null;
  classification: 'SOLD';
  priceIsEstimated: boolean;
  title: string;
  url: string;
}

export type CoverageReason =
  | 'below minimum floor'
  | 'insufficient page coverage'
  | 'coverage inconsistent versus prior run';

export type CoverageDecision =
  | { valid: true; reason: 'coverage acceptable'; detail: string }
  | { valid: false; reason: CoverageReason; detail: string };

export interface DetectionReport {
  platform: PlatformName;
  targetKey: string;
  snapshotDate: string;
  itemsScraped: number;
  itemsSold: number;
  itemsNew: number;
  itemsUpdated: number;
  /** Detected Sale rows actually inserted (duplicates are ignored by the store) */
  salesRecorded: number;
  events: ChangeEvent[];
  sales: DetectedSale[];
  snapshotSaved: boolean;
  isFirstRun: boolean;
  scraperFailed: boolean;
  scraperIncomplete: boolean;
  incompleteReason: CoverageReason | null;
}

export interface ScrapeLogEntry {
  runDate: string;
  platform: PlatformName;
  targetKey: string;
  status: 'success' | 'partial' | 'failed';
  itemsScraped: number;
  itemsSoldDetected: number;
  pagesAttempted: number;
  pagesTotalDetected: number | null;
  terminatedReason: TerminationReason;
  coverageReason: string | null;
  errors: string | null;
  durationSeconds: number;
}

// Configuration
export interface CrawlSettings {
  /** Hard page limit per target, 0 = every advertised page */
  maxPages: number;
  /** Page limit used when maxPages is 0 and the pre-scan could not read a page count */
  defaultMaxPages: number;
  pageRetries: number;
  consecutiveFailureLimit: number;
  minDelayMs: number;
  maxDelayMs: number;
}

export interface CoverageSettings {
  minItems: number;
  /** Minimum pagesAttempted / pagesTotalDetected ratio */
  minPageCoverage: number;
  /** Maximum day-over-day item count change, in percent */
  maxChangePercent: number;
}

export interface ResolverSettings {
  enabled: boolean;
  url: string;
  timeoutMs: number;
  maxConcurrency: number;
}

export interface BrowserSettings {
  wsEndpoint?: string;
  executablePath?: string;
  headless: boolean;
  navigationTimeoutMs: number;
}

export interface PlatformSettings {
  enabled: boolean;
  targets: string[];
  pageSize: number;
  excludedCountries: string[];
}

export interface Config {
  supabase: {
    url: string;
    serviceKey: string;
  };
  browser: BrowserSettings;
  resolver: ResolverSettings;
  crawl: CrawlSettings;
  coverage: CoverageSettings;
  platforms: Record<PlatformName, PlatformSettings>;
  monitor: {
    schedule: string;
    retentionDays: number;
  };
  app: {
    timezone: string;
    logLevel: string;
  };
}

// Utility Types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}
