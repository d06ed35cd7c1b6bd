import { describe, it, expect, vi, beforeEach, Mock } from 'vitest';
import { CrawlController } from './crawl-controller.js';
import { Chrono24Strategy } from '../platforms/chrono24.js';
import { CrawlSettings } from '../types/index.js';
import { ResolverRejected } from '../utils/errors.js';
import { FakeRenderSession, FakeResolver, resolvedPage, silentLogger } from '../test-support/fakes.js';
import { CHALLENGE_PAGE, chrono24BareCard, chrono24Cards, resultsPage } from '../test-support/listing-html.js';

vi.mock('../utils/logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

const strategy = new Chrono24Strategy({ pageSize: 120, excludedCountries: [] });
const SEARCH = strategy.buildSearchUrl('Speedmaster');
const P1 = 'https://www.chrono24.es/omega/speedmaster--mod83.htm';
const P2 = 'https://www.chrono24.es/omega/speedmaster--mod83-2.htm';
const P3 = 'https://www.chrono24.es/omega/speedmaster--mod83-3.htm';

const baseSettings: CrawlSettings = {
  maxPages: 0,
  defaultMaxPages: 3,
  pageRetries: 1,
  consecutiveFailureLimit: 2,
  minDelayMs: 5000,
  maxDelayMs: 8000,
};

function listingPage(ids: string[], advertised?: { items: number; pages: number }): string {
  const headline = advertised ? `<h1>${advertised.items} relojes</h1>` : '';
  const pagination = advertised
    ? `<nav class="pagination">${Array.from({ length: advertised.pages }, (_, i) => `<a>${i + 1}</a>`).join('')}</nav>`
    : '';
  return `<html><body>${headline}${chrono24Cards(ids).join('')}${pagination}</body></html>`;
}

describe('CrawlController', () => {
  let session: FakeRenderSession;
  let sleep: Mock<(ms: number) => Promise<void>>;

  beforeEach(() => {
    session = new FakeRenderSession().redirect(SEARCH, P1);
    sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
  });

  function controller(settings: Partial<CrawlSettings> = {}, resolver: FakeResolver | null = null): CrawlController {
    return new CrawlController({
      session,
      platform: strategy,
      resolver,
      settings: { ...baseSettings, ...settings },
      logger: silentLogger,
      sleep,
    });
  }

  it('should crawl every advertised page and deduplicate listings across pages', async () => {
    session
      .page(P1, listingPage(['1', '2', '3'], { items: 7, pages: 3 }))
      .page(P2, listingPage(['3', '4', '5']))
      .page(P3, listingPage(['6']));

    const { result, listings } = await controller().crawlTarget('Speedmaster');

    expect(result).toMatchObject({
      platform: 'chrono24',
      targetKey: 'Speedmaster',
      pagesAttempted: 3,
      pagesSucceeded: 3,
      pagesFailed: 0,
      pagesTotalDetected: 3,
      itemsTotalDetected: 7,
      rawItemsExtracted: 7,
      itemsCollected: 6,
      consecutiveFailures: 0,
      terminatedReason: 'no_more_pages',
    });
    expect(listings.map(l => l.listingId)).toEqual(['1', '2', '3', '4', '5', '6']);
    expect(listings.find(l => l.listingId === '3')?.seenAtPage).toBe(1);
    expect(session.visits).toEqual([SEARCH, P1, P2, P3]);
  });

  it('should wait a randomised delay between pages', async () => {
    session
      .page(P1, listingPage(['1'], { items: 2, pages: 2 }))
      .page(P2, listingPage(['2']));

    await controller().crawlTarget('Speedmaster');

    expect(sleep).toHaveBeenCalledTimes(1);
    const delay = sleep.mock.calls[0][0];
    expect(delay).toBeGreaterThanOrEqual(5000);
    expect(delay).toBeLessThanOrEqual(8000);
  });

  it('should cap the crawl at maxPages', async () => {
    session
      .page(P1, listingPage(['1'], { items: 300, pages: 3 }))
      .page(P2, listingPage(['2']))
      .page(P3, listingPage(['3']));

    const { result } = await controller({ maxPages: 2 }).crawlTarget('Speedmaster');

    expect(result.pagesAttempted).toBe(2);
    expect(result.pagesTotalDetected).toBe(3);
    expect(result.terminatedReason).toBe('page_limit_reached');
  });

  it('should stop the target after consecutive page failures', async () => {
    session
      .page(P1, listingPage(['1', '2', '3'], { items: 500, pages: 5 }))
      .page(P2, CHALLENGE_PAGE, 403)
      .page(P3, CHALLENGE_PAGE, 403);

    const { result, listings } = await controller().crawlTarget('Speedmaster');

    expect(result).toMatchObject({
      pagesAttempted: 3,
      pagesSucceeded: 1,
      pagesFailed: 2,
      consecutiveFailures: 2,
      terminatedReason: 'consecutive_failure_limit',
      itemsCollected: 3,
    });
    expect(listings).toHaveLength(3);
  });

  it('should reset consecutive failures when a page is rescued', async () => {
    const rescued = resultsPage(Array.from({ length: 10 }, (_, i) => chrono24BareCard({ id: String(100 + i) })));
    const resolver = new FakeResolver(url =>
      url === P2 ? resolvedPage(rescued) : new ResolverRejected('Challenge not solved', url, null)
    );
    session.page(P1, CHALLENGE_PAGE, 403).page(P2, CHALLENGE_PAGE, 403).page(P3, CHALLENGE_PAGE, 403);

    const { result, listings } = await controller({}, resolver).crawlTarget('Speedmaster');

    expect(result).toMatchObject({
      pagesAttempted: 3,
      pagesSucceeded: 1,
      pagesFailed: 2,
      consecutiveFailures: 1,
      pagesTotalDetected: null,
      terminatedReason: 'page_limit_reached',
      itemsCollected: 10,
    });
    expect(listings.every(l => l.seenAtPage === 2)).toBe(true);
    expect(resolver.calls).toEqual([P1, P2, P3]);
  });

  it('should retry a failed page before counting it', async () => {
    session
      .route(
        P1,
        { status: 200, html: listingPage(['1'], { items: 2, pages: 2 }) },
        { status: 403, html: CHALLENGE_PAGE },
        { status: 200, html: listingPage(['1'], { items: 2, pages: 2 }) }
      )
      .page(P2, listingPage(['2']));

    const { result } = await controller({ pageRetries: 2 }).crawlTarget('Speedmaster');

    expect(result).toMatchObject({ pagesAttempted: 2, pagesSucceeded: 2, pagesFailed: 0, itemsCollected: 2 });
    expect(sleep.mock.calls[0][0]).toBe(2000);
  });

  it('should stop when a page only repeats earlier listings and no page count is advertised', async () => {
    session.page(P1, listingPage(['1', '2'])).page(P2, listingPage(['1', '2']));

    const { result } = await controller({ defaultMaxPages: 5 }).crawlTarget('Speedmaster');

    expect(result.pagesAttempted).toBe(2);
    expect(result.terminatedReason).toBe('no_more_pages');
  });

  it('should report aborted when cancelled', async () => {
    session.page(P1, listingPage(['1'], { items: 1, pages: 1 }));
    const abort = new AbortController();
    abort.abort();

    const { result } = await controller().crawlTarget('Speedmaster', abort.signal);

    expect(result.terminatedReason).toBe('aborted');
    expect(result.pagesAttempted).toBe(0);
  });

  it('should keep crawling later targets after one fails', async () => {
    session.page(P1, listingPage(['1'], { items: 1, pages: 1 }));

    const outcomes = await controller().crawlTargets(['Seamaster', 'Speedmaster']);

    expect(outcomes.map(o => [o.result.targetKey, o.result.terminatedReason])).toEqual([
      ['Seamaster', 'consecutive_failure_limit'],
      ['Speedmaster', 'no_more_pages'],
    ]);
    expect(outcomes[1].listings).toHaveLength(1);
  });
});
