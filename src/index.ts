#!/usr/bin/env node

import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { config } from './utils/config.js';
import { logger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import { createPuppeteerSessionFactory } from './navigation/puppeteer-session.js';
import { createChallengeResolver } from './resolver/challenge-resolver-client.js';
import { getSupabaseClient } from './database/client.js';
import { SnapshotStore } from './database/snapshot-store.js';
import { InMemorySnapshotStore } from './database/in-memory-snapshot-store.js';
import { SupabaseSnapshotStore } from './database/supabase-snapshot-store.js';
import { schedulerState } from './database/scheduler-state.js';
import { MonitorOrchestrator, MonitorRunSummary } from './monitor/monitor-orchestrator.js';
import { JobScheduler } from './scheduler/scheduler.js';

export interface CliOptions {
  mode: 'once' | 'scheduler';
  dryRun: boolean;
}

export function parseArgs(args: string[]): CliOptions {
  const mode = args.find(arg => arg.startsWith('--mode='))?.split('=')[1] || 'once';
  if (mode !== 'once' && mode !== 'scheduler') {
    throw new Error(`Unknown mode "${mode}", expected "once" or "scheduler"`);
  }
  return {
    mode,
    dryRun: args.includes('--dry-run'),
  };
}

function createMonitor(dryRun: boolean): MonitorOrchestrator {
  const store: SnapshotStore = dryRun ? new InMemorySnapshotStore() : new SupabaseSnapshotStore(getSupabaseClient());

  return new MonitorOrchestrator({
    createSession: createPuppeteerSessionFactory(config.browser),
    store,
    resolver: createChallengeResolver(config.resolver),
    crawl: config.crawl,
    coverage: config.coverage,
    platforms: config.platforms,
    retentionDays: config.monitor.retentionDays,
  });
}

/**
 * One full monitor run: crawl, detect, prune
 */
async function runMonitorJob(dryRun: boolean, signal?: AbortSignal): Promise<MonitorRunSummary> {
  logger.info('=== Daily monitor run started ===', { dryRun });

  const summary = await createMonitor(dryRun).run(signal);

  for (const platform of summary.platforms) {
    for (const target of platform.targets) {
      logger.info('Target summary', {
        platform: platform.platform,
        target: target.targetKey,
        itemsCollected: target.crawl.itemsCollected,
        pages: `${target.crawl.pagesAttempted}/${target.crawl.pagesTotalDetected ?? '?'}`,
        terminatedReason: target.crawl.terminatedReason,
        sold: target.detection?.itemsSold ?? 0,
        added: target.detection?.itemsNew ?? 0,
        updated: target.detection?.itemsUpdated ?? 0,
        incomplete: target.detection?.incompleteReason ?? null,
        error: target.error,
      });
    }
  }

  logger.info('=== Daily monitor run completed ===', {
    duration: `${(summary.durationMs / 1000 / 60).toFixed(2)} minutes`,
    itemsScraped: summary.itemsScraped,
    salesRecorded: summary.salesRecorded,
  });

  const failed = summary.platforms.filter(p => p.error);
  if (failed.length > 0 && failed.length === summary.platforms.length) {
    throw new Error(`Every platform failed: ${failed.map(p => `${p.platform} (${p.error})`).join(', ')}`);
  }

  return summary;
}

async function startScheduler(options: CliOptions): Promise<void> {
  logger.info('Starting in scheduler mode');

  const scheduler = new JobScheduler(() => runMonitorJob(options.dryRun), schedulerState, {
    schedule: config.monitor.schedule,
    timezone: config.app.timezone,
    // The in-memory store has no history to catch up on
    checkMissedRuns: !options.dryRun,
    scheduleIntervalHours: 24,
  });

  await scheduler.start();

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    scheduler.stop();
    process.exit(0);
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

async function runOnce(options: CliOptions): Promise<void> {
  const abort = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Received SIGINT, stopping after the current page');
    abort.abort();
  });

  await runMonitorJob(options.dryRun, abort.signal);
}

// Main module check that works with both node and tsx
const isMainModule = !!process.argv[1] && resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isMainModule) {
  const options = parseArgs(process.argv.slice(2));
  const main = options.mode === 'scheduler' ? startScheduler(options) : runOnce(options);

  main
    .then(() => {
      if (options.mode === 'once') {
        logger.info('Job completed successfully');
        process.exit(0);
      }
    })
    .catch((error: unknown) => {
      logger.error('Job failed', { error: errorMessage(error) });
      process.exit(1);
    });
}

export { runMonitorJob };
