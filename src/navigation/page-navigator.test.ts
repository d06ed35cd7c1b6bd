import { describe, it, expect, vi } from 'vitest';
import { PageNavigator } from './page-navigator.js';
import { Chrono24Strategy } from '../platforms/chrono24.js';
import { ResolverTimeout } from '../utils/errors.js';
import { FakeRenderSession, FakeResolver, resolvedPage, silentLogger } from '../test-support/fakes.js';
import { CHALLENGE_PAGE, chrono24BareCard, chrono24Cards, resultsPage } from '../test-support/listing-html.js';

vi.mock('../utils/logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

const PAGE_1 = 'https://www.chrono24.es/omega/speedmaster--mod83.htm';
const PAGE_2 = 'https://www.chrono24.es/omega/speedmaster--mod83-2.htm';

const strategy = new Chrono24Strategy({ pageSize: 120, excludedCountries: ['Japón'] });

function pageOne(extra = ''): string {
  return resultsPage(chrono24Cards(['1', '2', '3']), { nextHref: '/omega/speedmaster--mod83-2.htm' }).replace(
    '<body>',
    `<body>${extra}`
  );
}

describe('PageNavigator', () => {
  it('should return listings from a direct load', async () => {
    const session = new FakeRenderSession().page(PAGE_1, pageOne());
    const navigator = new PageNavigator(session, strategy, null, silentLogger);

    const result = await navigator.navigatePage({ pageNumber: 1, url: PAGE_1, previousPageUrl: null });

    expect(result.finalState).toBe('SUCCESS');
    expect(result.stateTrail).toEqual(['DIRECT', 'SUCCESS']);
    expect(result.listings.map(l => l.listingId)).toEqual(['1', '2', '3']);
    expect(result.listings.every(l => l.seenAtPage === 1)).toBe(true);
    expect(session.visits).toEqual([PAGE_1]);
  });

  it('should rescue a challenged page through content replacement', async () => {
    const bareCards = Array.from({ length: 10 }, (_, i) => chrono24BareCard({ id: String(200 + i) }));
    const resolver = new FakeResolver(
      resolvedPage(resultsPage(bareCards), [{ name: 'cf_clearance', value: 'test-clearance', domain: '.chrono24.es' }])
    );
    const session = new FakeRenderSession().page(PAGE_1, pageOne()).page(PAGE_2, CHALLENGE_PAGE, 403);
    const navigator = new PageNavigator(session, strategy, resolver, silentLogger);

    const result = await navigator.navigatePage({ pageNumber: 2, url: PAGE_2, previousPageUrl: PAGE_1 });

    expect(result.stateTrail).toEqual(['DIRECT', 'INTERACTIVE_NAV', 'CHALLENGE_RESCUE', 'SUCCESS']);
    expect(result.finalState).toBe('SUCCESS');
    expect(result.listings).toHaveLength(10);
    expect(result.recognizedCount).toBe(10);
    expect(result.attempts.map(a => [a.strategy, a.outcome])).toEqual([
      ['DIRECT', 'challenge'],
      ['INTERACTIVE_NAV', 'challenge'],
      ['CHALLENGE_RESCUE', 'listings'],
    ]);
    expect(result.attempts[2].detail).toBe('content replacement');
    expect(resolver.calls).toEqual([PAGE_2]);
    expect(session.cookies.map(c => c.name)).toEqual(['cf_clearance']);
    expect(session.contentReplacements).toBe(1);
    expect(session.visits).toEqual([PAGE_2, PAGE_1, PAGE_2, PAGE_2]);
  });

  it('should keep the browser render when the resolver cookies clear the challenge', async () => {
    const resolver = new FakeResolver(
      resolvedPage('<html><body></body></html>', [{ name: 'cf_clearance', value: 'test-clearance', domain: '.chrono24.es' }])
    );
    const session = new FakeRenderSession()
      .page(PAGE_1, pageOne())
      .route(
        PAGE_2,
        { status: 403, html: CHALLENGE_PAGE },
        { status: 403, html: CHALLENGE_PAGE },
        { status: 200, html: resultsPage(chrono24Cards(['7', '8'])) }
      );
    const navigator = new PageNavigator(session, strategy, resolver, silentLogger);

    const result = await navigator.navigatePage({ pageNumber: 2, url: PAGE_2, previousPageUrl: PAGE_1 });

    expect(result.stateTrail).toEqual(['DIRECT', 'INTERACTIVE_NAV', 'CHALLENGE_RESCUE', 'SUCCESS']);
    expect(result.attempts[2]).toMatchObject({ strategy: 'CHALLENGE_RESCUE', outcome: 'listings', detail: 'resolver cookies' });
    expect(result.listings.map(l => l.listingId)).toEqual(['7', '8']);
    expect(session.contentReplacements).toBe(0);
  });

  it('should fall back to content replacement when the cookie re-render throws', async () => {
    const bareCards = Array.from({ length: 10 }, (_, i) => chrono24BareCard({ id: String(300 + i) }));
    const resolver = new FakeResolver(resolvedPage(resultsPage(bareCards)));
    const log = { ...silentLogger, warn: vi.fn() };
    const session = new FakeRenderSession()
      .page(PAGE_1, pageOne())
      .route(
        PAGE_2,
        { status: 403, html: CHALLENGE_PAGE },
        { status: 403, html: CHALLENGE_PAGE },
        new Error('Navigation timeout of 30000 ms exceeded')
      );
    const navigator = new PageNavigator(session, strategy, resolver, log);

    const result = await navigator.navigatePage({ pageNumber: 2, url: PAGE_2, previousPageUrl: PAGE_1 });

    expect(result.finalState).toBe('SUCCESS');
    expect(result.attempts[2]).toMatchObject({ strategy: 'CHALLENGE_RESCUE', outcome: 'listings', detail: 'content replacement' });
    expect(result.listings).toHaveLength(10);
    expect(session.contentReplacements).toBe(1);
    expect(log.warn).toHaveBeenCalledWith('Re-render with resolver cookies failed, replacing content', {
      platform: 'chrono24',
      page: 2,
      url: PAGE_2,
      chain: 'DIRECT → INTERACTIVE_NAV → CHALLENGE_RESCUE',
      error: 'Navigation timeout of 30000 ms exceeded',
    });
  });

  it('should succeed through the next-page control when the direct load is challenged', async () => {
    const pageTwo = resultsPage(chrono24Cards(['4', '5']));
    const session = new FakeRenderSession()
      .page(PAGE_1, pageOne('<div id="cookie-banner"><button id="onetrust-accept-btn-handler">Aceptar</button></div>'))
      .route(PAGE_2, { status: 403, html: CHALLENGE_PAGE }, { status: 200, html: pageTwo });
    const navigator = new PageNavigator(session, strategy, null, silentLogger);

    const result = await navigator.navigatePage({ pageNumber: 2, url: PAGE_2, previousPageUrl: PAGE_1 });

    expect(result.stateTrail).toEqual(['DIRECT', 'INTERACTIVE_NAV', 'SUCCESS']);
    expect(result.listings.map(l => l.listingId)).toEqual(['4', '5']);
    expect(session.clicks).toEqual(['#onetrust-accept-btn-handler', "a[aria-label='Next']"]);
  });

  it('should fail without a resolver when there is no previous page to click from', async () => {
    const session = new FakeRenderSession().page(PAGE_1, CHALLENGE_PAGE, 403);
    const navigator = new PageNavigator(session, strategy, null, silentLogger);

    const result = await navigator.navigatePage({ pageNumber: 1, url: PAGE_1, previousPageUrl: null });

    expect(result.finalState).toBe('PAGE_FAILED');
    expect(result.stateTrail).toEqual(['DIRECT', 'INTERACTIVE_NAV', 'PAGE_FAILED']);
    expect(result.listings).toEqual([]);
    expect(result.failureReason).toBe(
      'DIRECT:challenge (challenge marker "cf-chl-opt"), INTERACTIVE_NAV:unavailable (no previous page to navigate from)'
    );
  });

  it('should turn a resolver error into PAGE_FAILED', async () => {
    const resolver = new FakeResolver(new ResolverTimeout(PAGE_2, 60000));
    const session = new FakeRenderSession().page(PAGE_1, pageOne()).page(PAGE_2, CHALLENGE_PAGE, 403);
    const navigator = new PageNavigator(session, strategy, resolver, silentLogger);

    const result = await navigator.navigatePage({ pageNumber: 2, url: PAGE_2, previousPageUrl: PAGE_1 });

    expect(result.finalState).toBe('PAGE_FAILED');
    expect(result.attempts[2]).toEqual({
      pageNumber: 2,
      strategy: 'CHALLENGE_RESCUE',
      outcome: 'error',
      itemsFound: 0,
      detail: 'Challenge resolution timed out after 60000ms',
    });
  });

  it('should fail when the resolved page holds no listings either', async () => {
    const resolver = new FakeResolver(resolvedPage('<html><body><p>Sin resultados</p></body></html>'));
    const session = new FakeRenderSession().page(PAGE_2, '<html><body><p>Sin resultados</p></body></html>');
    const navigator = new PageNavigator(session, strategy, resolver, silentLogger);

    const result = await navigator.navigatePage({ pageNumber: 2, url: PAGE_2, previousPageUrl: null });

    expect(result.stateTrail).toEqual(['DIRECT', 'INTERACTIVE_NAV', 'CHALLENGE_RESCUE', 'PAGE_FAILED']);
    expect(result.attempts.map(a => a.outcome)).toEqual(['empty', 'unavailable', 'empty']);
  });

  it('should classify a navigation error as an error outcome and escalate', async () => {
    const session = new FakeRenderSession().route(PAGE_1, new Error('net::ERR_CONNECTION_RESET'));
    const navigator = new PageNavigator(session, strategy, null, silentLogger);

    const result = await navigator.navigatePage({ pageNumber: 1, url: PAGE_1, previousPageUrl: null });

    expect(result.attempts[0]).toMatchObject({ strategy: 'DIRECT', outcome: 'error', detail: 'net::ERR_CONNECTION_RESET' });
    expect(result.finalState).toBe('PAGE_FAILED');
  });

  it('should count a page of only excluded-country listings as a success', async () => {
    const cards = ['<article class="article-item-container"><a href="/x--id9.htm"></a><div class="article-seller-country">Japón</div></article>'];
    const session = new FakeRenderSession().page(PAGE_1, resultsPage(cards));
    const navigator = new PageNavigator(session, strategy, null, silentLogger);

    const result = await navigator.navigatePage({ pageNumber: 1, url: PAGE_1, previousPageUrl: null });

    expect(result.finalState).toBe('SUCCESS');
    expect(result.recognizedCount).toBe(1);
    expect(result.listings).toEqual([]);
  });
});
