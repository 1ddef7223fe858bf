import Parser from 'rss-parser';
import { BaseParser } from './base';
import { type CanonicalJob, type ParserSourceId, FIELD_LIMITS } from '../types/job';
import { SourceParseError } from '../errors';
import { stripHtml } from '../utils/html';
import { cleanUrl, truncate } from '../utils/normalize';

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_LOOKBACK_DAYS = 7;

interface FeedItemFields {
  region?: string;
  category?: string;
}

/**
 * Splits "Company Name: Job Title" on the first colon.
 * Without a colon the whole string is the job title.
 */
export function splitFeedTitle(rawTitle: string): { company: string; title: string } {
  const colon = rawTitle.indexOf(':');
  if (colon === -1) {
    return { company: '', title: rawTitle.trim() };
  }
  return {
    company: rawTitle.slice(0, colon).trim(),
    title: rawTitle.slice(colon + 1).trim(),
  };
}

/**
 * WeWorkRemotely RSS parser
 * Feeds: https://weworkremotely.com/categories/<category>.rss
 */
export class WeWorkRemotelyParser extends BaseParser {
  readonly source: ParserSourceId = 'weworkremotely';
  private readonly feedParser: Parser<Record<string, unknown>, FeedItemFields>;

  constructor(private readonly lookbackDays: number = DEFAULT_LOOKBACK_DAYS) {
    super();
    this.feedParser = new Parser<Record<string, unknown>, FeedItemFields>({
      customFields: {
        item: ['region', 'category'],
      },
    });
  }

  /**
   * Items published before receivedAt minus the lookback window are dropped
   */
  async parse(rawContent: string, receivedAt: Date): Promise<CanonicalJob[]> {
    let feed: Parser.Output<FeedItemFields>;
    try {
      feed = await this.feedParser.parseString(rawContent);
    } catch (error) {
      throw new SourceParseError(this.source, error);
    }

    const cutoff = new Date(receivedAt.getTime() - this.lookbackDays * DAY_MS);
    const jobs: CanonicalJob[] = [];
    const seenUrls = new Set<string>();
    let skippedBeforeCutoff = 0;
    let skippedInvalid = 0;

    for (const item of feed.items ?? []) {
      try {
        if (!item.title || !item.link) {
          skippedInvalid++;
          this.log.debug('Skipping item with missing title or link', {
            hasTitle: !!item.title,
            hasLink: !!item.link,
          });
          continue;
        }

        const url = cleanUrl(item.link);
        if (seenUrls.has(url)) continue;

        let publishedAt = receivedAt;
        if (item.pubDate) {
          const parsed = new Date(item.pubDate);
          if (isNaN(parsed.getTime())) {
            this.log.debug(`Unparseable date for item: ${item.title}`, { pubDate: item.pubDate });
          } else if (parsed < cutoff) {
            skippedBeforeCutoff++;
            continue;
          } else {
            publishedAt = parsed;
          }
        }

        const { company, title } = splitFeedTitle(item.title);
        const description = truncate(stripHtml(item.content ?? ''), FIELD_LIMITS.feedDescription);

        const job = this.buildJob({
          url,
          title,
          company,
          location: 'Remote',
          rawText: description || item.title,
          description,
          receivedAt: publishedAt,
        });

        if (!job) {
          skippedInvalid++;
          continue;
        }

        seenUrls.add(url);
        jobs.push(job);
      } catch (error) {
        skippedInvalid++;
        this.log.warn(`Failed to normalize item from ${this.source}`, {
          error: error instanceof Error ? error.message : String(error),
          title: item.title,
          link: item.link,
        });
      }
    }

    this.log.info(`Parsed ${jobs.length} jobs from ${this.source} feed`, {
      totalItems: feed.items?.length ?? 0,
      skippedBeforeCutoff,
      skippedInvalid,
      cutoff: cutoff.toISOString(),
    });

    return jobs;
  }
}
