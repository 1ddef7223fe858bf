import { CaptureService } from './capture';
import { FeedFetcher } from './feed-fetcher';
import type { ContentFetcher } from './fetcher';
import { IngestionPipeline } from './ingestion';
import { MailScanner, type MailTransport } from './mail-scanner';
import { ScanService } from './scan';
import type { Config } from '../config';
import type { JobStore } from '../db/store';
import { createParserRegistry } from '../sources';

export interface IngestionServices {
  pipeline: IngestionPipeline;
  capture: CaptureService;
  scan: ScanService;
}

/**
 * Wires the pipeline once per process from configuration and a store.
 * Mail is scanned only when a transport is supplied.
 */
export function createIngestionServices(
  config: Config,
  store: JobStore,
  options: { mailTransport?: MailTransport } = {}
): IngestionServices {
  const registry = createParserRegistry(config);
  const pipeline = new IngestionPipeline({ registry, store });

  const fetchers: ContentFetcher[] = [];
  if (registry.has('weworkremotely')) {
    fetchers.push(new FeedFetcher({ feedUrls: config.feedUrls, timeoutMs: config.feedTimeoutMs }));
  }
  if (options.mailTransport) {
    fetchers.push(
      new MailScanner({
        transport: options.mailTransport,
        maxResults: config.mailMaxResults,
        timeoutMs: config.feedTimeoutMs,
      })
    );
  }

  return {
    pipeline,
    capture: new CaptureService(pipeline),
    scan: new ScanService(fetchers, pipeline),
  };
}

export { CaptureService } from './capture';
export { FeedFetcher } from './feed-fetcher';
export { IngestionPipeline } from './ingestion';
export { MailScanner } from './mail-scanner';
export { ScanService } from './scan';
export type { CaptureResult } from './capture';
export type { FailedSource, IngestReport, MergeOutcome } from './ingestion';
export type { MailMessage, MailTransport } from './mail-scanner';
export type { ScanReport } from './scan';
