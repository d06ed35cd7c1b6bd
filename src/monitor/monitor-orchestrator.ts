import {
  CoverageSettings,
  CrawlOutcome,
  CrawlSettings,
  DetectionReport,
  Logger,
  PlatformName,
  PlatformSettings,
  ScrapeRunResult,
} from '../types/index.js';
import { logger as defaultLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { captureError } from '../utils/sentry.js';
import { daysAgo, today } from '../utils/dates.js';
import { PLATFORM_NAMES, createPlatformStrategy } from '../platforms/index.js';
import { RenderSessionFactory } from '../navigation/render-session.js';
import { ChallengeResolver } from '../resolver/challenge-resolver-client.js';
import { CrawlController } from '../crawler/crawl-controller.js';
import { SnapshotStore } from '../database/snapshot-store.js';
import { CoverageValidator } from '../detection/coverage-validator.js';
import { SaleDetectionService } from '../detection/sale-detection-service.js';
import { SoldPriceOptions, soldPriceOptions } from '../detection/sold-price-lookup.js';

export interface MonitorDeps {
  createSession: RenderSessionFactory;
  store: SnapshotStore;
  resolver: ChallengeResolver | null;
  crawl: CrawlSettings;
  coverage: CoverageSettings;
  platforms: Record<PlatformName, PlatformSettings>;
  retentionDays: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  /** Snapshot date for the run, `yyyy-MM-dd` */
  snapshotDate?: () => string;
}

export interface TargetRunSummary {
  targetKey: string;
  crawl: ScrapeRunResult;
  /** Absent when detection itself failed */
  detection: DetectionReport | null;
  error?: string;
}

export interface PlatformRunSummary {
  platform: PlatformName;
  targets: TargetRunSummary[];
  /** Set when the platform stopped before finishing its targets */
  error?: string;
}

export interface MonitorRunSummary {
  snapshotDate: string;
  platforms: PlatformRunSummary[];
  itemsScraped: number;
  salesRecorded: number;
  /** Null when pruning failed */
  snapshotsPruned: number | null;
  durationMs: number;
}

/**
 * Daily monitor run: every enabled platform crawls concurrently on its own
 * render session, targets within a platform run one after another, and each
 * finished crawl goes straight to sale detection.
 */
export class MonitorOrchestrator {
  private readonly log: Logger;
  private readonly detection: SaleDetectionService;

  constructor(private readonly deps: MonitorDeps) {
    this.log = deps.logger ?? defaultLogger;
    this.detection = new SaleDetectionService(deps.store, new CoverageValidator(deps.coverage), this.log);
  }

  async run(signal?: AbortSignal): Promise<MonitorRunSummary> {
    const startedAt = Date.now();
    const snapshotDate = this.deps.snapshotDate ? this.deps.snapshotDate() : today();

    const enabled = PLATFORM_NAMES.filter(name => {
      const settings = this.deps.platforms[name];
      if (!settings.enabled) return false;
      if (settings.targets.length === 0) {
        this.log.warn('Platform enabled without targets, skipping', { platform: name });
        return false;
      }
      return true;
    });

    this.log.info('Starting monitor run', { snapshotDate, platforms: enabled });

    const platforms = await Promise.all(enabled.map(name => this.runPlatform(name, snapshotDate, signal)));
    const snapshotsPruned = await this.prune(snapshotDate);

    const reports = platforms.flatMap(p => p.targets).flatMap(t => (t.detection ? [t.detection] : []));
    const summary: MonitorRunSummary = {
      snapshotDate,
      platforms,
      itemsScraped: reports.reduce((sum, r) => sum + r.itemsScraped, 0),
      salesRecorded: reports.reduce((sum, r) => sum + r.salesRecorded, 0),
      snapshotsPruned,
      durationMs: Date.now() - startedAt,
    };

    this.log.info('Monitor run complete', {
      snapshotDate,
      platforms: platforms.length,
      failedPlatforms: platforms.filter(p => p.error).map(p => p.platform),
      itemsScraped: summary.itemsScraped,
      salesRecorded: summary.salesRecorded,
      snapshotsPruned,
      durationMs: summary.durationMs,
    });

    return summary;
  }

  private async runPlatform(name: PlatformName, snapshotDate: string, signal?: AbortSignal): Promise<PlatformRunSummary> {
    const settings = this.deps.platforms[name];
    const summary: PlatformRunSummary = { platform: name, targets: [] };

    try {
      const session = await this.deps.createSession();

      try {
        const platform = createPlatformStrategy(name, settings);
        const soldPrice = soldPriceOptions(platform, session, this.log);
        const controller = new CrawlController({
          session,
          platform,
          resolver: this.deps.resolver,
          settings: this.deps.crawl,
          logger: this.log,
          sleep: this.deps.sleep,
        });

        await controller.crawlTargets(settings.targets, {
          signal,
          onOutcome: async outcome => {
            summary.targets.push(await this.detect(outcome, snapshotDate, soldPrice));
          },
        });
      } finally {
        await session.close().catch((error: unknown) => {
          this.log.warn('Failed to close render session', { platform: name, error: errorMessage(error) });
        });
      }
    } catch (error) {
      summary.error = errorMessage(error);
      this.log.error('Platform run failed', { platform: name, error: summary.error });
      if (error instanceof Error) {
        captureError(error, { platform: name, snapshotDate });
      }
    }

    return summary;
  }

  private async detect(
    outcome: CrawlOutcome,
    snapshotDate: string,
    soldPrice: SoldPriceOptions
  ): Promise<TargetRunSummary> {
    const { result } = outcome;

    try {
      const detection = await this.detection.process(result, outcome.listings, snapshotDate, soldPrice);
      return { targetKey: result.targetKey, crawl: result, detection };
    } catch (error) {
      if (error instanceof Error) {
        captureError(error, { platform: result.platform, target: result.targetKey, snapshotDate });
      }
      return { targetKey: result.targetKey, crawl: result, detection: null, error: errorMessage(error) };
    }
  }

  private async prune(snapshotDate: string): Promise<number | null> {
    const cutoff = daysAgo(snapshotDate, this.deps.retentionDays);
    try {
      return await this.deps.store.pruneSnapshotsBefore(cutoff);
    } catch (error) {
      this.log.error('Failed to prune old snapshots', { before: cutoff, error: errorMessage(error) });
      return null;
    }
  }
}
