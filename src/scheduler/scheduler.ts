import * as cron from 'node-cron';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { nextDailyRun } from '../utils/dates.js';
import { dailyMonitorCron, withCronMonitoring } from '../utils/sentry.js';
import { SchedulerStateStore } from '../database/scheduler-state.js';

/**
 * Job scheduler for the daily monitor run
 *
 * Cron schedule format:
 * ┌────────────── minute (0-59)
 * │ ┌──────────── hour (0-23)
 * │ │ ┌────────── day of month (1-31)
 * │ │ │ ┌──────── month (1-12)
 * │ │ │ │ ┌────── day of week (0-7, 0 and 7 are Sunday)
 * │ │ │ │ │
 * * * * * *
 */

export interface SchedulerConfig {
  /** Cron expression for schedule (default: '0 6 * * *' = 6 AM daily) */
  schedule?: string;
  timezone?: string;
  /** Run immediately on startup */
  runOnStart?: boolean;
  /** Check for missed runs on startup (default: true) */
  checkMissedRuns?: boolean;
  /** Schedule interval in hours for missed run detection (default: 24 = daily) */
  scheduleIntervalHours?: number;
}

export type JobTrigger = 'scheduled' | 'manual' | 'missed';

export class JobScheduler {
  private task: cron.ScheduledTask | null = null;
  private isRunning = false;
  private readonly config: Required<SchedulerConfig>;

  constructor(
    private readonly job: () => Promise<unknown>,
    private readonly state: SchedulerStateStore,
    config: SchedulerConfig = {}
  ) {
    this.config = {
      schedule: config.schedule || '0 6 * * *',
      timezone: config.timezone || 'Europe/Madrid',
      runOnStart: config.runOnStart ?? false,
      checkMissedRuns: config.checkMissedRuns ?? true,
      scheduleIntervalHours: config.scheduleIntervalHours ?? 24,
    };
  }

  async start(): Promise<void> {
    if (this.task) {
      logger.warn('Scheduler is already running');
      return;
    }

    if (!cron.validate(this.config.schedule)) {
      throw new Error(`Invalid cron expression: ${this.config.schedule}`);
    }

    logger.info('Starting job scheduler', {
      schedule: this.config.schedule,
      timezone: this.config.timezone,
      runOnStart: this.config.runOnStart,
      checkMissedRuns: this.config.checkMissedRuns,
    });

    const missed = this.config.checkMissedRuns
      ? await this.state.checkMissedRun(this.config.scheduleIntervalHours)
      : false;

    this.task = cron.schedule(
      this.config.schedule,
      () => {
        this.runNow('scheduled').catch((error: unknown) => {
          logger.error('Scheduled run failed', { error: errorMessage(error) });
        });
      },
      { timezone: this.config.timezone }
    );

    logger.info('Job scheduler started', { schedule: this.config.schedule, nextRun: this.getNextRun()?.toISOString() });

    if (missed) {
      logger.warn('Missed run detected - running catch-up job now');
      await this.runNow('missed');
    } else if (this.config.runOnStart) {
      logger.info('Running job immediately on startup');
      await this.runNow('manual');
    }
  }

  /**
   * Run the job outside the schedule. Overlapping runs are skipped.
   */
  async runNow(trigger: JobTrigger = 'manual'): Promise<boolean> {
    if (this.isRunning) {
      logger.warn('Previous job still running, skipping this execution', { trigger });
      return false;
    }

    this.isRunning = true;
    logger.info(`Job execution triggered (${trigger})`);

    try {
      await withCronMonitoring(dailyMonitorCron(this.config.schedule, this.config.timezone), this.job);
      await this.state.updateLastRun('success', this.getNextRun() ?? undefined);
      logger.info(`Job completed successfully (${trigger})`);
      return true;
    } catch (error) {
      logger.error(`Job failed (${trigger})`, { error: errorMessage(error) });
      await this.state.updateLastRun('failed', this.getNextRun() ?? undefined);
      throw error;
    } finally {
      this.isRunning = false;
    }
  }

  stop(): void {
    if (this.task) {
      logger.info('Stopping job scheduler');
      this.task.stop();
      this.task = null;
    }
  }

  /**
   * Next daily run from the minute and hour fields, on the configured timezone's clock.
   * Null for schedules that are not plain daily expressions.
   */
  getNextRun(now: Date = new Date()): Date | null {
    const [minute, hour] = this.config.schedule.split(' ');
    if (!/^\d+$/.test(minute ?? '') || !/^\d+$/.test(hour ?? '')) return null;

    return nextDailyRun(parseInt(hour, 10), parseInt(minute, 10), this.config.timezone, now);
  }

  isSchedulerRunning(): boolean {
    return this.task !== null;
  }

  isJobRunning(): boolean {
    return this.isRunning;
  }
}
