import { type ContentFetcher, type FetchOutcome, describeError } from './fetcher';
import type { FailedSource } from './ingestion';
import type { ParserSourceId, RawContent } from '../types/job';
import { type Logger, logger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';

export interface MailMessage {
  id: string;
  /** HTML body of the alert email */
  body: string;
  receivedAt: Date;
}

/**
 * Mailbox access; implementations translate Gmail-style search queries
 */
export interface MailTransport {
  search(query: string, maxResults: number): Promise<MailMessage[]>;
}

export interface MailQuery {
  query: string;
  source: ParserSourceId;
}

export const DEFAULT_MAIL_QUERIES: readonly MailQuery[] = [
  { query: 'from:jobs-noreply@linkedin.com', source: 'linkedin' },
  { query: 'from:jobalerts-noreply@linkedin.com', source: 'linkedin' },
  { query: 'from:noreply@indeed.com subject:job', source: 'indeed' },
  { query: 'from:alert@indeed.com', source: 'indeed' },
  { query: 'from:greenhouse.io', source: 'greenhouse' },
  { query: 'from:wellfound.com', source: 'wellfound' },
];

/**
 * Gmail date filter, YYYY/MM/DD in UTC
 */
export function formatAfterClause(since: Date): string {
  const year = since.getUTCFullYear();
  const month = String(since.getUTCMonth() + 1).padStart(2, '0');
  const day = String(since.getUTCDate()).padStart(2, '0');
  return `after:${year}/${month}/${day}`;
}

export interface MailScannerOptions {
  transport: MailTransport;
  maxResults: number;
  timeoutMs: number;
  queries?: readonly MailQuery[];
  log?: Logger;
}

/**
 * Runs every alert query concurrently and turns the messages into raw content
 */
export class MailScanner implements ContentFetcher {
  readonly name = 'mail';
  private readonly queries: readonly MailQuery[];
  private readonly log: Logger;

  constructor(private readonly options: MailScannerOptions) {
    this.queries = options.queries ?? DEFAULT_MAIL_QUERIES;
    this.log = options.log ?? logger.child('mail');
  }

  fetch(since: Date): Promise<FetchOutcome> {
    return this.scan(since);
  }

  async scan(since: Date): Promise<FetchOutcome> {
    const after = formatAfterClause(since);
    const searches = this.queries.map(({ query }) => `${query} ${after}`);

    const settled = await Promise.allSettled(
      searches.map(search =>
        withTimeout(
          this.options.transport.search(search, this.options.maxResults),
          this.options.timeoutMs,
          `Mail query "${search}"`
        )
      )
    );

    const contents: RawContent[] = [];
    const failures: FailedSource[] = [];
    const seenMessages = new Set<string>();

    settled.forEach((result, index) => {
      const { source } = this.queries[index];
      const origin = searches[index];

      if (result.status === 'rejected') {
        this.log.error(`Mail query failed: ${origin}`, result.reason);
        failures.push({ origin, source, reason: 'fetch_error', message: describeError(result.reason) });
        return;
      }

      for (const message of result.value) {
        if (seenMessages.has(message.id)) continue;
        seenMessages.add(message.id);
        contents.push({
          rawContent: message.body,
          receivedAt: message.receivedAt,
          sourceHint: source,
          origin,
        });
      }
    });

    this.log.info('Mail scan complete', {
      queries: searches.length,
      messages: contents.length,
      failed: failures.length,
    });

    return { contents, failures };
  }
}
