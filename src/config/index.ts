/**
 * Configuration management
 * All behavior is driven by environment variables
 */
import { ConfigError } from '../errors';
import { type ParserSourceId } from '../types/job';

export const DEFAULT_FEED_URLS = [
  'https://weworkremotely.com/categories/remote-programming-jobs.rss',
  'https://weworkremotely.com/categories/remote-devops-sysadmin-jobs.rss',
  'https://weworkremotely.com/categories/remote-full-stack-programming-jobs.rss',
  'https://weworkremotely.com/remote-jobs.rss',
];

export interface Config {
  // Database
  databaseUrl?: string;

  // Ingestion window
  lookbackDays: number;

  // Fetching
  feedUrls: string[];
  feedTimeoutMs: number;
  mailMaxResults: number;

  // Source toggles
  enabledSources: ParserSourceId[];

  // Capture endpoint
  captureSecret?: string;
}

type Env = Record<string, string | undefined>;

function parseStringArray(value: string | undefined, defaultValue: string[] = []): string[] {
  if (!value) return defaultValue;
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

function parseBoolean(value: string | undefined, defaultValue: boolean = false): boolean {
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed <= 0 ? defaultValue : parsed;
}

const SOURCE_TOGGLES: ReadonlyArray<readonly [envVar: string, source: ParserSourceId]> = [
  ['ENABLE_LINKEDIN', 'linkedin'],
  ['ENABLE_INDEED', 'indeed'],
  ['ENABLE_GREENHOUSE', 'greenhouse'],
  ['ENABLE_WELLFOUND', 'wellfound'],
  ['ENABLE_WWR', 'weworkremotely'],
];

export function loadConfig(
  env: Env = process.env,
  options: { requireDatabase?: boolean } = {}
): Config {
  const databaseUrl = env.DATABASE_URL || undefined;
  if (options.requireDatabase && !databaseUrl) {
    throw new ConfigError('Missing required environment variable: DATABASE_URL');
  }

  return {
    databaseUrl,
    lookbackDays: parseNumber(env.JOB_LOOKBACK_DAYS, 7),
    feedUrls: parseStringArray(env.WWR_FEED_URLS, DEFAULT_FEED_URLS),
    feedTimeoutMs: parseNumber(env.FEED_TIMEOUT_MS, 10000),
    mailMaxResults: parseNumber(env.MAIL_MAX_RESULTS, 50),
    enabledSources: SOURCE_TOGGLES
      .filter(([envVar]) => parseBoolean(env[envVar], true))
      .map(([, source]) => source),
    captureSecret: env.CAPTURE_SECRET || undefined,
  };
}
