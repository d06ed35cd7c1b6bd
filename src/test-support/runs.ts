import { Listing, PlatformName, ScrapeRunResult } from '../types/index.js';

export function listing(listingId: string, price: number | null, platform: PlatformName = 'chrono24'): Listing {
  return {
    platform,
    listingId,
    title: `Watch ${listingId}`,
    price,
    currency: 'EUR',
    condition: null,
    country: 'Alemania',
    imageUrl: null,
    url: `https://www.chrono24.es/omega/watch--id${listingId}.htm`,
    seenAtPage: 1,
  };
}

/** A complete crawl of a single advertised page unless overridden */
export function scrapeRun(overrides: Partial<ScrapeRunResult> = {}): ScrapeRunResult {
  return {
    platform: 'chrono24',
    targetKey: 'Speedmaster',
    pagesAttempted: 1,
    pagesSucceeded: 1,
    pagesFailed: 0,
    pagesTotalDetected: 1,
    itemsTotalDetected: 2,
    rawItemsExtracted: 2,
    itemsCollected: 2,
    consecutiveFailures: 0,
    terminatedReason: 'no_more_pages',
    durationMs: 1000,
    ...overrides,
  };
}
