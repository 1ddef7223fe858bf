import { type ContentFetcher, describeError } from './fetcher';
import type { FailedSource, IngestionPipeline } from './ingestion';
import type { RawContent } from '../types/job';
import { type Logger, logger } from '../utils/logger';

export interface ScanReport {
  found: number;
  new: number;
  failedSources: FailedSource[];
  /** Documents collected per fetcher */
  fetched: Record<string, number>;
}

/**
 * Orchestrates fetching from all enabled fetchers and ingests the result
 */
export class ScanService {
  private readonly log: Logger;

  constructor(
    private readonly fetchers: ContentFetcher[],
    private readonly pipeline: IngestionPipeline,
    log?: Logger
  ) {
    this.log = log ?? logger.child('scan');
  }

  async run(since: Date): Promise<ScanReport> {
    this.log.info(`Scanning ${this.fetchers.length} fetchers since ${since.toISOString()}`);

    const settled = await Promise.allSettled(this.fetchers.map(fetcher => fetcher.fetch(since)));

    const contents: RawContent[] = [];
    const fetchFailures: FailedSource[] = [];
    const fetched: Record<string, number> = {};

    settled.forEach((result, index) => {
      const { name } = this.fetchers[index];
      if (result.status === 'fulfilled') {
        contents.push(...result.value.contents);
        fetchFailures.push(...result.value.failures);
        fetched[name] = result.value.contents.length;
      } else {
        // Isolated failure; other fetchers continue
        this.log.error(`Fetcher ${name} failed`, result.reason);
        fetchFailures.push({ origin: name, reason: 'fetch_error', message: describeError(result.reason) });
        fetched[name] = 0;
      }
    });

    const report = await this.pipeline.ingestMany(contents);

    this.log.info('Scan completed', {
      documents: contents.length,
      found: report.found,
      new: report.new,
      failedSources: fetchFailures.length + report.failedSources.length,
    });

    return {
      found: report.found,
      new: report.new,
      failedSources: [...fetchFailures, ...report.failedSources],
      fetched,
    };
  }
}
