import fetch, { type RequestInit, type Response } from 'node-fetch';
import { type ContentFetcher, type FetchOutcome, describeError } from './fetcher';
import type { FailedSource } from './ingestion';
import type { RawContent } from '../types/job';
import { type Logger, logger } from '../utils/logger';

export const FEED_USER_AGENT = 'JobTracker/1.0';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface FeedFetcherOptions {
  feedUrls: string[];
  timeoutMs: number;
  fetchImpl?: FetchLike;
  now?: () => Date;
  log?: Logger;
}

/**
 * Downloads the configured WeWorkRemotely RSS feeds in parallel.
 * The lookback window is applied by the feed parser, not here.
 */
export class FeedFetcher implements ContentFetcher {
  readonly name = 'feeds';
  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(private readonly options: FeedFetcherOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? (() => new Date());
    this.log = options.log ?? logger.child('feeds');
  }

  fetch(): Promise<FetchOutcome> {
    return this.fetchAll();
  }

  async fetchAll(): Promise<FetchOutcome> {
    const { feedUrls } = this.options;
    const settled = await Promise.allSettled(feedUrls.map(url => this.fetchFeed(url)));

    const contents: RawContent[] = [];
    const failures: FailedSource[] = [];

    settled.forEach((result, index) => {
      const origin = feedUrls[index];
      if (result.status === 'fulfilled') {
        contents.push(result.value);
      } else {
        this.log.error(`Feed fetch failed: ${origin}`, result.reason);
        failures.push({
          origin,
          source: 'weworkremotely',
          reason: 'fetch_error',
          message: describeError(result.reason),
        });
      }
    });

    this.log.info('Feed fetch complete', { fetched: contents.length, failed: failures.length });
    return { contents, failures };
  }

  private async fetchFeed(url: string): Promise<RawContent> {
    const response = await this.fetchImpl(url, {
      headers: { 'User-Agent': FEED_USER_AGENT },
      timeout: this.options.timeoutMs,
    });

    if (!response.ok) {
      throw new Error(`Feed returned ${response.status}`);
    }

    return {
      rawContent: await response.text(),
      receivedAt: this.now(),
      sourceHint: 'weworkremotely',
      origin: url,
    };
  }
}
