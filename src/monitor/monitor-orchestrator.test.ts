import { describe, it, expect, vi, beforeEach } from 'vitest';
import { MonitorOrchestrator, MonitorDeps } from './monitor-orchestrator.js';
import { InMemorySnapshotStore } from '../database/in-memory-snapshot-store.js';
import { Chrono24Strategy } from '../platforms/chrono24.js';
import { PlatformName, PlatformSettings } from '../types/index.js';
import { FakeRenderSession, silentLogger } from '../test-support/fakes.js';
import { chrono24Cards } from '../test-support/listing-html.js';
import { listing } from '../test-support/runs.js';
import { captureError } from '../utils/sentry.js';

vi.mock('../utils/logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

vi.mock('../utils/sentry.js', () => ({
  captureError: vi.fn(),
  captureMessage: vi.fn(),
}));

const TODAY = '2026-03-10';
const SEARCH = new Chrono24Strategy({ pageSize: 120, excludedCountries: [] }).buildSearchUrl('Speedmaster');
const P1 = 'https://www.chrono24.es/omega/speedmaster--mod83.htm';

function platformSettings(overrides: Partial<Record<PlatformName, Partial<PlatformSettings>>> = {}) {
  const disabled: PlatformSettings = { enabled: false, targets: [], pageSize: 60, excludedCountries: [] };
  return {
    chrono24: { ...disabled, enabled: true, targets: ['Speedmaster'], pageSize: 120, ...overrides.chrono24 },
    vestiaire: { ...disabled, ...overrides.vestiaire },
    catawiki: { ...disabled, ...overrides.catawiki },
  };
}

function singlePage(ids: string[]): string {
  return `<html><body><h1>${ids.length} relojes</h1>${chrono24Cards(ids).join('')}<nav class="pagination"><a>1</a></nav></body></html>`;
}

describe('MonitorOrchestrator', () => {
  let store: InMemorySnapshotStore;
  let session: FakeRenderSession;

  beforeEach(() => {
    vi.clearAllMocks();
    store = new InMemorySnapshotStore();
    session = new FakeRenderSession().redirect(SEARCH, P1).page(P1, singlePage(['1', '2', '3']));
  });

  function orchestrator(overrides: Partial<MonitorDeps> = {}): MonitorOrchestrator {
    return new MonitorOrchestrator({
      createSession: async () => session,
      store,
      resolver: null,
      crawl: { maxPages: 0, defaultMaxPages: 3, pageRetries: 1, consecutiveFailureLimit: 2, minDelayMs: 0, maxDelayMs: 0 },
      coverage: { minItems: 1, minPageCoverage: 0.1, maxChangePercent: 10 },
      platforms: platformSettings(),
      retentionDays: 30,
      logger: silentLogger,
      sleep: async () => {},
      snapshotDate: () => TODAY,
      ...overrides,
    });
  }

  it('should crawl a target and record sales against yesterday', async () => {
    await store.saveSnapshot({
      platform: 'chrono24',
      targetKey: 'Speedmaster',
      snapshotDate: '2026-03-09',
      listings: ['1', '2', '3', '4'].map(id => listing(id, 1000)),
    });

    const summary = await orchestrator().run();

    expect(summary.snapshotDate).toBe(TODAY);
    expect(summary.platforms).toHaveLength(1);
    const [target] = summary.platforms[0].targets;
    expect(target.crawl).toMatchObject({ itemsCollected: 3, pagesTotalDetected: 1, terminatedReason: 'no_more_pages' });
    expect(target.detection).toMatchObject({ itemsSold: 1, salesRecorded: 1, scraperIncomplete: false });
    expect(store.getDetectedSales().map(s => [s.listingId, s.salePrice, s.priceIsEstimated])).toEqual([['4', 1000, true]]);
    expect(summary).toMatchObject({ itemsScraped: 3, salesRecorded: 1, snapshotsPruned: 0 });
    expect(session.closed).toBe(true);
  });

  it('should keep other platforms running when one fails to start', async () => {
    const createSession = vi
      .fn<() => Promise<FakeRenderSession>>()
      .mockResolvedValueOnce(session)
      .mockRejectedValueOnce(new Error('browser crashed'));

    const summary = await orchestrator({
      createSession,
      platforms: platformSettings({ vestiaire: { enabled: true, targets: ['123456'] } }),
    }).run();

    expect(summary.platforms.map(p => [p.platform, p.error])).toEqual([
      ['chrono24', undefined],
      ['vestiaire', 'browser crashed'],
    ]);
    expect(summary.platforms[0].targets[0].detection?.isFirstRun).toBe(true);
    expect(captureError).toHaveBeenCalledWith(expect.any(Error), { platform: 'vestiaire', snapshotDate: TODAY });
  });

  it('should skip enabled platforms without targets', async () => {
    const createSession = vi.fn(async () => session);

    const summary = await orchestrator({
      createSession,
      platforms: platformSettings({ chrono24: { targets: [] } }),
    }).run();

    expect(summary.platforms).toEqual([]);
    expect(createSession).not.toHaveBeenCalled();
  });

  it('should record a detection failure on the target and carry on', async () => {
    vi.spyOn(store, 'getSnapshot').mockRejectedValue(new Error('connection reset'));

    const summary = await orchestrator().run();

    expect(summary.platforms[0].error).toBeUndefined();
    expect(summary.platforms[0].targets[0]).toMatchObject({ detection: null, error: 'connection reset' });
    expect(summary.salesRecorded).toBe(0);
  });

  it('should prune snapshots older than the retention window', async () => {
    await store.saveSnapshot({
      platform: 'chrono24',
      targetKey: 'Speedmaster',
      snapshotDate: '2026-02-07',
      listings: [listing('old', 500)],
    });
    await store.saveSnapshot({
      platform: 'chrono24',
      targetKey: 'Speedmaster',
      snapshotDate: '2026-02-08',
      listings: [listing('kept', 500)],
    });

    const summary = await orchestrator().run();

    expect(summary.snapshotsPruned).toBe(1);
    expect((await store.getFirstSeenDates('chrono24', ['old', 'kept'])).get('kept')).toBe('2026-02-08');
  });
});
