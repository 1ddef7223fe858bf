import type { FailedSource } from './ingestion';
import type { RawContent } from '../types/job';

/**
 * Documents collected by one fetcher, plus the feeds or queries that failed
 */
export interface FetchOutcome {
  contents: RawContent[];
  failures: FailedSource[];
}

/**
 * Common capability of every raw-content fetcher
 */
export interface ContentFetcher {
  readonly name: string;
  fetch(since: Date): Promise<FetchOutcome>;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
