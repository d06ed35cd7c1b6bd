import * as Sentry from '@sentry/node';

// Only enabled when a DSN is configured
const sentryDsn = process.env.SENTRY_DSN || '';
const sentryEnabled = !!sentryDsn;

if (sentryEnabled) {
  Sentry.init({
    dsn: sentryDsn,
    environment: process.env.SENTRY_ENVIRONMENT || process.env.NODE_ENV || 'development',
    tracesSampleRate: 0.2,
    sampleRate: 1.0,
    release: process.env.SENTRY_RELEASE || undefined,
    serverName: process.env.HOSTNAME || 'listing-delta-monitor',
  });
}

export function captureError(error: Error, context?: Record<string, unknown>): void {
  if (!sentryEnabled) return;

  Sentry.withScope((scope) => {
    if (context) {
      scope.setExtras(context);
    }
    Sentry.captureException(error);
  });
}

/** Non-error notification, e.g. a day whose sale detection was suppressed */
export function captureMessage(
  message: string,
  level: 'info' | 'warning' | 'error' = 'info',
  context?: Record<string, unknown>
): void {
  if (!sentryEnabled) return;

  Sentry.withScope((scope) => {
    scope.setLevel(level);
    if (context) {
      scope.setExtras(context);
    }
    Sentry.captureMessage(message);
  });
}

// ============================================
// Cron Monitoring (Sentry Crons)
// ============================================

export interface CronMonitorConfig {
  /** Unique identifier for this monitor (slug format) */
  monitorSlug: string;
  /** Cron schedule expression (e.g., '0 6 * * *') */
  schedule: string;
  timezone: string;
  /** Maximum expected runtime in minutes */
  maxRuntimeMinutes?: number;
  /** Grace period in minutes before alerting on a missed check-in */
  checkinMarginMinutes?: number;
}

export function dailyMonitorCron(schedule: string, timezone: string): CronMonitorConfig {
  return {
    monitorSlug: 'daily-listing-monitor',
    schedule,
    timezone,
    maxRuntimeMinutes: 240,
    checkinMarginMinutes: 10,
  };
}

/**
 * Execute a job with Sentry cron check-ins around it.
 * The job's own error is re-thrown after the failed check-in is sent.
 */
export async function withCronMonitoring<T>(
  monitor: CronMonitorConfig,
  jobFn: () => Promise<T>
): Promise<T> {
  const checkInId = sentryEnabled
    ? Sentry.captureCheckIn(
        { monitorSlug: monitor.monitorSlug, status: 'in_progress' },
        {
          schedule: { type: 'crontab', value: monitor.schedule },
          timezone: monitor.timezone,
          checkinMargin: monitor.checkinMarginMinutes,
          maxRuntime: monitor.maxRuntimeMinutes,
        }
      )
    : null;

  try {
    const result = await jobFn();
    if (checkInId) {
      Sentry.captureCheckIn({ checkInId, monitorSlug: monitor.monitorSlug, status: 'ok' });
    }
    return result;
  } catch (error) {
    if (checkInId) {
      Sentry.captureCheckIn({ checkInId, monitorSlug: monitor.monitorSlug, status: 'error' });
    }
    if (error instanceof Error) {
      captureError(error, { monitorSlug: monitor.monitorSlug });
    }
    throw error;
  }
}
