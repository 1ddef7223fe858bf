import type { VercelRequest, VercelResponse } from '@vercel/node';
import { loadConfig } from '../../src/config';
import { getPool } from '../../src/db/client';
import { JobsRepository } from '../../src/db/jobs';
import { createIngestionServices } from '../../src/services';
import { isAuthorized } from '../../src/utils/auth';
import { logger } from '../../src/utils/logger';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Feed scan cron endpoint
 * Runs via Vercel Cron; pulls the RSS feeds and ingests new postings
 */
export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  if (!isAuthorized(req.headers.authorization, process.env.CRON_SECRET)) {
    logger.warn('Unauthorized cron request', {
      authHeader: req.headers.authorization ? 'present' : 'missing',
    });
    res.status(401).json({ error: 'Unauthorized' });
    return;
  }

  const startTime = Date.now();
  logger.info('Feed scan cron started');

  try {
    const config = loadConfig(process.env, { requireDatabase: true });
    logger.info('Configuration loaded', {
      enabledSources: config.enabledSources,
      lookbackDays: config.lookbackDays,
      feeds: config.feedUrls.length,
    });

    const since = new Date(startTime - config.lookbackDays * DAY_MS);
    const { scan } = createIngestionServices(config, new JobsRepository(getPool()));
    const report = await scan.run(since);

    const duration = Date.now() - startTime;
    logger.info('Feed scan cron completed', {
      duration: `${duration}ms`,
      found: report.found,
      new: report.new,
      failedSources: report.failedSources.length,
    });

    res.status(200).json({
      success: true,
      stats: {
        found: report.found,
        new: report.new,
        fetched: report.fetched,
        duration: `${duration}ms`,
      },
      failedSources: report.failedSources,
    });
  } catch (error) {
    const duration = Date.now() - startTime;
    logger.error('Feed scan cron failed', error, { duration: `${duration}ms` });

    res.status(500).json({
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}
