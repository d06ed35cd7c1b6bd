import { DetectedSale, DetectionReport, Listing, Logger, ScrapeLogEntry, ScrapeRunResult } from '../types/index.js';
import { logger as defaultLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { captureMessage } from '../utils/sentry.js';
import { previousDay } from '../utils/dates.js';
import { SnapshotStore } from '../database/snapshot-store.js';
import { CoverageValidator } from './coverage-validator.js';
import { diffSnapshots } from './diff-engine.js';
import { SoldPriceLookup, SoldPriceOptions } from './sold-price-lookup.js';

/**
 * Turns one target's crawl into a persisted snapshot and, when coverage
 * allows it, into Detected Sales. Every call appends a scrape log entry.
 */
export class SaleDetectionService {
  constructor(
    private readonly store: SnapshotStore,
    private readonly validator: CoverageValidator,
    private readonly log: Logger = defaultLogger
  ) {}

  async process(
    run: ScrapeRunResult,
    listings: Listing[],
    snapshotDate: string,
    soldPrice: SoldPriceOptions = { finalPriceKnown: false }
  ): Promise<DetectionReport> {
    const startedAt = Date.now();
    const report: DetectionReport = {
      platform: run.platform,
      targetKey: run.targetKey,
      snapshotDate,
      itemsScraped: listings.length,
      itemsSold: 0,
      itemsNew: 0,
      itemsUpdated: 0,
      salesRecorded: 0,
      events: [],
      sales: [],
      snapshotSaved: false,
      isFirstRun: false,
      scraperFailed: false,
      scraperIncomplete: false,
      incompleteReason: null,
    };
    let coverageDetail: string | null = null;
    let failure: string | null = null;

    try {
      if (listings.length === 0) {
        // An empty snapshot would turn all of yesterday into sales
        report.scraperFailed = true;
        this.log.error('Crawl returned no listings, skipping detection', {
          platform: run.platform,
          target: run.targetKey,
          terminatedReason: run.terminatedReason,
          error: run.error,
        });
        return report;
      }

      const yesterday = await this.store.getSnapshot(run.platform, run.targetKey, previousDay(snapshotDate));

      if (yesterday.length === 0) {
        await this.saveSnapshot(run, listings, snapshotDate);
        report.snapshotSaved = true;
        report.isFirstRun = true;
        report.itemsNew = listings.length;
        this.log.info('No previous snapshot, baseline saved', {
          platform: run.platform,
          target: run.targetKey,
          listings: listings.length,
        });
        return report;
      }

      const decision = this.validator.validate(run, yesterday.length);
      coverageDetail = decision.detail;

      if (!decision.valid) {
        await this.saveSnapshot(run, listings, snapshotDate);
        report.snapshotSaved = true;
        report.scraperIncomplete = true;
        report.incompleteReason = decision.reason;
        this.log.warn('Coverage insufficient, sale detection suppressed', {
          platform: run.platform,
          target: run.targetKey,
          reason: decision.reason,
          detail: decision.detail,
        });
        captureMessage('Sale detection suppressed', 'warning', {
          platform: run.platform,
          target: run.targetKey,
          reason: decision.reason,
          detail: decision.detail,
        });
        return report;
      }

      const goneIds = yesterday
        .map(listing => listing.listingId)
        .filter(id => !listings.some(listing => listing.listingId === id));
      const firstSeen = await this.store.getFirstSeenDates(run.platform, goneIds);

      const diff = diffSnapshots({
        platform: run.platform,
        targetKey: run.targetKey,
        detectionDate: snapshotDate,
        yesterday,
        today: listings,
        firstSeen,
        finalPriceKnown: soldPrice.finalPriceKnown,
      });
      const sales =
        soldPrice.lookupSoldPrice && diff.sales.length > 0
          ? await this.confirmSalePrices(run, diff.sales, soldPrice.lookupSoldPrice)
          : diff.sales;

      await this.saveSnapshot(run, listings, snapshotDate);
      report.snapshotSaved = true;

      let recorded = 0;
      for (const sale of sales) {
        if (await this.store.saveDetectedSale(sale)) {
          recorded++;
        }
      }

      report.events = diff.events;
      report.sales = sales;
      report.itemsSold = diff.sold;
      report.itemsNew = diff.added;
      report.itemsUpdated = diff.updated;
      report.salesRecorded = recorded;

      this.log.info('Sale detection complete', {
        platform: run.platform,
        target: run.targetKey,
        yesterday: yesterday.length,
        today: listings.length,
        sold: diff.sold,
        added: diff.added,
        updated: diff.updated,
        salesRecorded: recorded,
      });
      return report;
    } catch (error) {
      failure = errorMessage(error);
      this.log.error('Sale detection failed', { platform: run.platform, target: run.targetKey, error: failure });
      throw error;
    } finally {
      await this.writeLog(run, report, coverageDetail, failure, startedAt);
    }
  }

  private async confirmSalePrices(
    run: ScrapeRunResult,
    sales: DetectedSale[],
    lookup: SoldPriceLookup
  ): Promise<DetectedSale[]> {
    const confirmed: DetectedSale[] = [];
    for (const sale of sales) {
      const salePrice = await lookup(sale);
      confirmed.push(salePrice === null ? sale : { ...sale, salePrice, priceIsEstimated: false });
    }

    this.log.info('Sold prices looked up', {
      platform: run.platform,
      target: run.targetKey,
      sales: sales.length,
      confirmed: confirmed.filter(sale => !sale.priceIsEstimated).length,
    });
    return confirmed;
  }

  private async saveSnapshot(run: ScrapeRunResult, listings: Listing[], snapshotDate: string): Promise<void> {
    await this.store.saveSnapshot({
      platform: run.platform,
      targetKey: run.targetKey,
      snapshotDate,
      listings,
    });
  }

  private async writeLog(
    run: ScrapeRunResult,
    report: DetectionReport,
    coverageDetail: string | null,
    failure: string | null,
    startedAt: number
  ): Promise<void> {
    const errors = [run.error, failure].filter((message): message is string => !!message);
    const entry: ScrapeLogEntry = {
      runDate: report.snapshotDate,
      platform: run.platform,
      targetKey: run.targetKey,
      status: failure ? 'failed' : runStatus(run, report),
      itemsScraped: report.itemsScraped,
      itemsSoldDetected: report.salesRecorded,
      pagesAttempted: run.pagesAttempted,
      pagesTotalDetected: run.pagesTotalDetected,
      terminatedReason: run.terminatedReason,
      coverageReason: report.incompleteReason ? `${report.incompleteReason}: ${coverageDetail}` : null,
      errors: errors.length > 0 ? errors.join('; ') : null,
      durationSeconds: Math.round((run.durationMs + Date.now() - startedAt) / 1000),
    };

    try {
      await this.store.logScrapeRun(entry);
    } catch (error) {
      this.log.error('Failed to write scrape log', {
        platform: run.platform,
        target: run.targetKey,
        error: errorMessage(error),
      });
    }
  }
}

function runStatus(run: ScrapeRunResult, report: DetectionReport): ScrapeLogEntry['status'] {
  if (report.scraperFailed) return 'failed';
  if (
    report.scraperIncomplete ||
    run.pagesFailed > 0 ||
    run.terminatedReason === 'aborted' ||
    run.terminatedReason === 'consecutive_failure_limit'
  ) {
    return 'partial';
  }
  return 'success';
}
