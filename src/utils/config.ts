import { config as dotenvConfig } from 'dotenv';
import { Config } from '../types/index.js';

dotenvConfig();

function getEnvVar(key: string, required = true): string {
  const value = process.env[key];
  if (required && !value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value || '';
}

function getNumberEnv(key: string, fallback: number): number {
  const raw = getEnvVar(key, false);
  if (!raw) return fallback;

  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new Error(`Environment variable ${key} must be a number, got "${raw}"`);
  }
  return value;
}

function getBooleanEnv(key: string, fallback: boolean): boolean {
  const raw = getEnvVar(key, false).toLowerCase();
  if (!raw) return fallback;
  return raw === 'true' || raw === '1' || raw === 'yes';
}

function getListEnv(key: string, fallback: string[] = []): string[] {
  const raw = getEnvVar(key, false);
  if (!raw) return fallback;
  return raw.split(',').map(v => v.trim()).filter(v => v.length > 0);
}

export const config: Config = {
  supabase: {
    // Checked when the client is first created so --dry-run works without a database
    url: getEnvVar('SUPABASE_URL', false),
    serviceKey: getEnvVar('SUPABASE_SERVICE_KEY', false),
  },
  browser: {
    wsEndpoint: getEnvVar('BROWSER_WS_ENDPOINT', false) || undefined,
    executablePath: getEnvVar('CHROME_EXECUTABLE_PATH', false) || undefined,
    headless: getBooleanEnv('BROWSER_HEADLESS', true),
    navigationTimeoutMs: getNumberEnv('NAVIGATION_TIMEOUT_MS', 30000),
  },
  resolver: {
    enabled: getBooleanEnv('RESOLVER_ENABLED', true),
    url: getEnvVar('RESOLVER_URL', false) || 'http://localhost:8191/v1',
    timeoutMs: getNumberEnv('RESOLVER_TIMEOUT_MS', 60000),
    maxConcurrency: getNumberEnv('RESOLVER_MAX_CONCURRENCY', 1),
  },
  crawl: {
    maxPages: getNumberEnv('CRAWL_MAX_PAGES', 0),
    defaultMaxPages: getNumberEnv('CRAWL_DEFAULT_MAX_PAGES', 20),
    pageRetries: getNumberEnv('CRAWL_PAGE_RETRIES', 3),
    consecutiveFailureLimit: getNumberEnv('CRAWL_CONSECUTIVE_FAILURE_LIMIT', 2),
    minDelayMs: getNumberEnv('CRAWL_MIN_DELAY_MS', 5000),
    maxDelayMs: getNumberEnv('CRAWL_MAX_DELAY_MS', 8000),
  },
  coverage: {
    minItems: getNumberEnv('COVERAGE_MIN_ITEMS', 100),
    minPageCoverage: getNumberEnv('COVERAGE_MIN_PAGE_RATIO', 0.1),
    maxChangePercent: getNumberEnv('COVERAGE_MAX_CHANGE_PERCENT', 10),
  },
  platforms: {
    chrono24: {
      enabled: getBooleanEnv('CHRONO24_ENABLED', true),
      targets: getListEnv('CHRONO24_MODELS'),
      pageSize: getNumberEnv('CHRONO24_PAGE_SIZE', 120),
      excludedCountries: getListEnv('CHRONO24_EXCLUDED_COUNTRIES', ['Japan', 'Japón', 'JP']),
    },
    vestiaire: {
      enabled: getBooleanEnv('VESTIAIRE_ENABLED', true),
      targets: getListEnv('VESTIAIRE_SELLER_IDS'),
      pageSize: 60,
      excludedCountries: [],
    },
    catawiki: {
      enabled: getBooleanEnv('CATAWIKI_ENABLED', false),
      targets: getListEnv('CATAWIKI_MODELS'),
      pageSize: getNumberEnv('CATAWIKI_PAGE_SIZE', 24),
      excludedCountries: [],
    },
  },
  monitor: {
    schedule: getEnvVar('MONITOR_SCHEDULE', false) || '0 6 * * *',
    retentionDays: getNumberEnv('SNAPSHOT_RETENTION_DAYS', 30),
  },
  app: {
    timezone: getEnvVar('TIMEZONE', false) || 'Europe/Madrid',
    logLevel: getEnvVar('LOG_LEVEL', false) || 'info',
  },
};
