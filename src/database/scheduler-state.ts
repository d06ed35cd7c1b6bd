import { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { getSupabaseClient } from './client.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

/**
 * Scheduler state management
 * Tracks the last monitor run so a restart can catch up on a missed day
 */

const schedulerStateSchema = z.object({
  last_run_at: z.string(),
  last_run_status: z.enum(['success', 'failed']),
  next_scheduled_run: z.string().nullable(),
});

export type RunStatus = z.infer<typeof schedulerStateSchema>['last_run_status'];

export interface SchedulerStateStore {
  getLastRunTime(): Promise<Date | null>;
  updateLastRun(status: RunStatus, nextScheduledRun?: Date): Promise<void>;
  checkMissedRun(scheduleIntervalHours: number, now?: Date): Promise<boolean>;
}

export class SchedulerStateManager implements SchedulerStateStore {
  private readonly TABLE_NAME = 'scheduler_state';

  constructor(private readonly getClient: () => SupabaseClient = getSupabaseClient) {}

  async getLastRunTime(): Promise<Date | null> {
    try {
      const { data, error } = await this.getClient()
        .from(this.TABLE_NAME)
        .select('last_run_at, last_run_status, next_scheduled_run')
        .order('last_run_at', { ascending: false })
        .limit(1)
        .single();

      if (error) {
        if (error.code === 'PGRST116') {
          // No rows found - first run
          logger.info('No previous runs found');
          return null;
        }
        throw new Error(error.message);
      }

      return new Date(schedulerStateSchema.parse(data).last_run_at);
    } catch (error) {
      logger.error('Failed to get last run time', { error: errorMessage(error) });
      return null;
    }
  }

  async updateLastRun(status: RunStatus, nextScheduledRun?: Date): Promise<void> {
    try {
      const now = new Date().toISOString();

      const { error } = await this.getClient()
        .from(this.TABLE_NAME)
        .upsert(
          {
            id: 1, // Single row
            last_run_at: now,
            last_run_status: status,
            next_scheduled_run: nextScheduledRun ? nextScheduledRun.toISOString() : null,
            updated_at: now,
          },
          { onConflict: 'id' }
        );

      if (error) {
        throw new Error(error.message);
      }

      logger.info('Updated scheduler state', { status, nextRun: nextScheduledRun?.toISOString() });
    } catch (error) {
      logger.error('Failed to update scheduler state', { error: errorMessage(error) });
    }
  }

  /**
   * A run counts as missed one hour after it was due.
   */
  async checkMissedRun(scheduleIntervalHours: number, now: Date = new Date()): Promise<boolean> {
    const lastRun = await this.getLastRunTime();

    if (!lastRun) {
      logger.info('No previous run detected - first run');
      return false;
    }

    const hoursSinceLastRun = (now.getTime() - lastRun.getTime()) / (1000 * 60 * 60);

    if (hoursSinceLastRun >= scheduleIntervalHours + 1) {
      logger.warn('Missed scheduled run detected', {
        lastRun: lastRun.toISOString(),
        hoursSinceLastRun: hoursSinceLastRun.toFixed(2),
        scheduleIntervalHours,
      });
      return true;
    }

    logger.info('No missed run', {
      lastRun: lastRun.toISOString(),
      hoursSinceLastRun: hoursSinceLastRun.toFixed(2),
    });
    return false;
  }
}

export const schedulerState = new SchedulerStateManager();
