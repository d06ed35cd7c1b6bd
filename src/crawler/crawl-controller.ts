/**
 * Crawl Controller
 * Walks one target's result pages in order through the Page Navigator,
 * deduplicates listings across pages and reports coverage metadata for the
 * run. Pages are sequential: page N's interactive fallback clicks "next" on
 * page N-1.
 */

import {
  CrawlOutcome,
  CrawlSettings,
  Listing,
  Logger,
  ScrapeRunResult,
  TerminationReason,
} from '../types/index.js';
import { logger as defaultLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { PlatformStrategy, AdvertisedTotals } from '../platforms/platform-strategy.js';
import { ChallengeResolver } from '../resolver/challenge-resolver-client.js';
import { RenderSession } from '../navigation/render-session.js';
import { PageNavigationResult, PageNavigator, PageRequest } from '../navigation/page-navigator.js';
import { dismissOverlays } from '../navigation/overlay-dismisser.js';

export interface CrawlControllerDeps {
  session: RenderSession;
  platform: PlatformStrategy;
  resolver: ChallengeResolver | null;
  settings: CrawlSettings;
  logger?: Logger;
  /** Injected so tests can skip the politeness delays */
  sleep?: (ms: number) => Promise<void>;
}

export interface CrawlTargetsOptions {
  signal?: AbortSignal;
  onOutcome?: (outcome: CrawlOutcome) => Promise<void>;
}

interface PreScanResult {
  baseUrl: string;
  totals: AdvertisedTotals;
}

interface RunCounters {
  pagesAttempted: number;
  pagesSucceeded: number;
  pagesFailed: number;
  consecutiveFailures: number;
  rawItemsExtracted: number;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class CrawlController {
  private readonly session: RenderSession;
  private readonly platform: PlatformStrategy;
  private readonly settings: CrawlSettings;
  private readonly log: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly navigator: PageNavigator;

  constructor(deps: CrawlControllerDeps) {
    this.session = deps.session;
    this.platform = deps.platform;
    this.settings = deps.settings;
    this.log = deps.logger ?? defaultLogger;
    this.sleep = deps.sleep ?? defaultSleep;
    this.navigator = new PageNavigator(deps.session, deps.platform, deps.resolver, this.log);
  }

  /**
   * Crawl every target in order on the shared session. A target that ends
   * badly never stops the ones after it. `onOutcome` runs before the next
   * target starts.
   */
  async crawlTargets(targetKeys: string[], options: CrawlTargetsOptions = {}): Promise<CrawlOutcome[]> {
    const outcomes: CrawlOutcome[] = [];

    for (let i = 0; i < targetKeys.length; i++) {
      const outcome = await this.crawlTarget(targetKeys[i], options.signal);
      outcomes.push(outcome);
      await options.onOutcome?.(outcome);

      if (i < targetKeys.length - 1) {
        await this.politenessDelay();
      }
    }

    return outcomes;
  }

  async crawlTarget(targetKey: string, signal?: AbortSignal): Promise<CrawlOutcome> {
    const startedAt = Date.now();
    const seen = new Map<string, Listing>();
    const counters: RunCounters = {
      pagesAttempted: 0,
      pagesSucceeded: 0,
      pagesFailed: 0,
      consecutiveFailures: 0,
      rawItemsExtracted: 0,
    };
    let totals: AdvertisedTotals = { totalItems: null, totalPages: null };

    this.log.info('Starting target crawl', { platform: this.platform.name, target: targetKey });

    try {
      const preScan = await this.preScan(targetKey);
      totals = preScan.totals;

      const pageLimit = this.pageLimit(totals.totalPages);
      this.log.info('Pre-scan complete', {
        platform: this.platform.name,
        target: targetKey,
        baseUrl: preScan.baseUrl,
        itemsTotalDetected: totals.totalItems,
        pagesTotalDetected: totals.totalPages,
        pageLimit,
      });

      const terminatedReason = await this.crawlPages(preScan, pageLimit, seen, counters, signal);
      return this.finish(targetKey, startedAt, totals, counters, seen, terminatedReason);
    } catch (error) {
      const message = errorMessage(error);
      this.log.error('Target crawl aborted', {
        platform: this.platform.name,
        target: targetKey,
        pagesAttempted: counters.pagesAttempted,
        error: message,
      });
      return this.finish(targetKey, startedAt, totals, counters, seen, 'aborted', message);
    }
  }

  private async crawlPages(
    preScan: PreScanResult,
    pageLimit: number,
    seen: Map<string, Listing>,
    counters: RunCounters,
    signal?: AbortSignal
  ): Promise<TerminationReason> {
    const advertisedPages = preScan.totals.totalPages;
    let previousPageUrl: string | null = null;

    for (let pageNumber = 1; pageNumber <= pageLimit; pageNumber++) {
      if (signal?.aborted) {
        return 'aborted';
      }

      const url = this.platform.pageUrl(preScan.baseUrl, pageNumber);
      counters.pagesAttempted++;

      const page = await this.fetchPage({ pageNumber, url, previousPageUrl });

      if (page.finalState === 'SUCCESS') {
        counters.pagesSucceeded++;
        counters.consecutiveFailures = 0;
        counters.rawItemsExtracted += page.listings.length;
        previousPageUrl = url;

        let added = 0;
        for (const listing of page.listings) {
          const key = `${listing.platform}:${listing.listingId}`;
          if (!seen.has(key)) {
            seen.set(key, listing);
            added++;
          }
        }

        this.log.info('Page complete', {
          platform: this.platform.name,
          page: pageNumber,
          pageLimit,
          listings: page.listings.length,
          newListings: added,
          totalCollected: seen.size,
        });

        // Without an advertised page count, a page of repeats means the marketplace is serving its last page again
        if (advertisedPages === null && page.listings.length > 0 && added === 0) {
          this.log.info('Page repeated earlier listings, stopping', { platform: this.platform.name, page: pageNumber });
          return 'no_more_pages';
        }
      } else {
        counters.pagesFailed++;
        counters.consecutiveFailures++;
        previousPageUrl = null;

        if (counters.consecutiveFailures >= this.settings.consecutiveFailureLimit) {
          this.log.warn('Consecutive failure limit reached', {
            platform: this.platform.name,
            page: pageNumber,
            consecutiveFailures: counters.consecutiveFailures,
            limit: this.settings.consecutiveFailureLimit,
          });
          return 'consecutive_failure_limit';
        }
      }

      if (pageNumber < pageLimit) {
        await this.politenessDelay();
      }
    }

    return advertisedPages !== null && pageLimit >= advertisedPages ? 'no_more_pages' : 'page_limit_reached';
  }

  /**
   * Load the search page once: settle overlays, switch to the largest page
   * size, then read the advertised totals and the post-redirect URL.
   */
  private async preScan(targetKey: string): Promise<PreScanResult> {
    const searchUrl = this.platform.buildSearchUrl(targetKey);

    try {
      await this.session.navigate(searchUrl);
      await dismissOverlays(this.session, undefined, this.log);

      for (const selector of this.platform.selectors.pageSize) {
        if (await this.session.click(selector)) {
          this.log.debug('Applied page size option', { platform: this.platform.name, selector });
          await dismissOverlays(this.session, undefined, this.log);
          break;
        }
      }

      const totals = this.platform.detectTotals(await this.session.content());
      return { baseUrl: this.session.currentUrl(), totals };
    } catch (error) {
      this.log.warn('Pre-scan failed, advertised totals unknown', {
        platform: this.platform.name,
        target: targetKey,
        error: errorMessage(error),
      });
      return { baseUrl: searchUrl, totals: { totalItems: null, totalPages: null } };
    }
  }

  private async fetchPage(request: PageRequest): Promise<PageNavigationResult> {
    const attempts = Math.max(1, this.settings.pageRetries);
    let result = await this.navigator.navigatePage(request);

    for (let attempt = 2; attempt <= attempts && result.finalState === 'PAGE_FAILED'; attempt++) {
      const delay = Math.pow(2, attempt - 1) * 1000;
      this.log.warn('Page failed, retrying', {
        platform: this.platform.name,
        page: request.pageNumber,
        attempt,
        maxAttempts: attempts,
        delayMs: delay,
        reason: result.failureReason,
      });
      await this.sleep(delay);
      result = await this.navigator.navigatePage(request);
    }

    return result;
  }

  private pageLimit(pagesDetected: number | null): number {
    const { maxPages, defaultMaxPages } = this.settings;
    if (maxPages > 0) {
      return Math.min(pagesDetected ?? maxPages, maxPages);
    }
    return pagesDetected ?? defaultMaxPages;
  }

  private async politenessDelay(): Promise<void> {
    const { minDelayMs, maxDelayMs } = this.settings;
    const delay = minDelayMs + Math.random() * Math.max(0, maxDelayMs - minDelayMs);
    await this.sleep(delay);
  }

  private finish(
    targetKey: string,
    startedAt: number,
    totals: AdvertisedTotals,
    counters: RunCounters,
    seen: Map<string, Listing>,
    terminatedReason: TerminationReason,
    error?: string
  ): CrawlOutcome {
    const listings = [...seen.values()];
    const result: ScrapeRunResult = {
      platform: this.platform.name,
      targetKey,
      ...counters,
      pagesTotalDetected: totals.totalPages,
      itemsTotalDetected: totals.totalItems,
      itemsCollected: listings.length,
      terminatedReason,
      durationMs: Date.now() - startedAt,
      ...(error ? { error } : {}),
    };

    this.logVariance(result);
    this.log.info('Target crawl finished', {
      platform: result.platform,
      target: targetKey,
      itemsCollected: result.itemsCollected,
      rawItemsExtracted: result.rawItemsExtracted,
      pagesAttempted: result.pagesAttempted,
      pagesFailed: result.pagesFailed,
      terminatedReason,
      durationMs: result.durationMs,
    });

    return { result, listings };
  }

  private logVariance(result: ScrapeRunResult): void {
    if (result.itemsTotalDetected === null) return;

    const variance = result.itemsCollected - result.itemsTotalDetected;
    const meta = {
      platform: result.platform,
      target: result.targetKey,
      itemsCollected: result.itemsCollected,
      itemsTotalDetected: result.itemsTotalDetected,
      variance,
      tolerance: this.platform.paginationTolerance,
    };

    if (Math.abs(variance) <= this.platform.paginationTolerance) {
      this.log.info('Collected items within pagination tolerance', meta);
    } else {
      this.log.warn('Collected items outside pagination tolerance', meta);
    }
  }
}
