import * as cheerio from 'cheerio';
import { type Element, isTag } from 'domhandler';
import { BaseParser, type JobCandidate } from './base';
import type { CanonicalJob } from '../types/job';
import { SourceParseError } from '../errors';
import { joinedText } from '../utils/html';
import { cleanText, cleanUrl } from '../utils/normalize';

export type Link = cheerio.Cheerio<Element>;

/**
 * Job-alert email parser driven by anchors that point at a job-view URL.
 * Subclasses supply the URL pattern and the per-card extraction.
 */
export abstract class HtmlEmailParser extends BaseParser {
  /**
   * Matches hrefs of job-view links; must not carry the g flag
   */
  protected abstract readonly linkPattern: RegExp;

  /**
   * Pulls fields for one job link, or null when the link is not a usable card
   */
  protected abstract extract(link: Link, url: string, receivedAt: Date): JobCandidate | null;

  async parse(rawContent: string, receivedAt: Date): Promise<CanonicalJob[]> {
    let $: cheerio.CheerioAPI;
    try {
      $ = cheerio.load(rawContent);
    } catch (error) {
      throw new SourceParseError(this.source, error);
    }

    const jobs: CanonicalJob[] = [];
    const seenUrls = new Set<string>();
    let matchedLinks = 0;
    let skipped = 0;

    $('a[href]').each((_, element) => {
      const link = $(element);
      const href = link.attr('href') ?? '';
      if (!this.linkPattern.test(href)) return;
      matchedLinks++;

      const url = cleanUrl(href);
      if (!url || seenUrls.has(url)) return;

      try {
        const candidate = this.extract(link, url, receivedAt);
        const job = candidate ? this.buildJob(candidate) : null;
        if (!job) {
          skipped++;
          return;
        }

        // Only a link that produced a job claims its URL, so an icon-only
        // link ahead of the titled one does not hide it
        seenUrls.add(url);
        jobs.push(job);
      } catch (error) {
        skipped++;
        this.log.debug('Failed to extract job link, skipping', {
          url,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    });

    this.log.info(`Parsed ${jobs.length} jobs from ${this.source} email`, {
      matchedLinks,
      skipped,
    });

    return jobs;
  }

  /**
   * Title from the link's first heading-like descendant, else the whole link text
   */
  protected titleFrom(link: Link): string {
    const heading = link.find('h1, h2, h3, h4, strong, b, span').first();
    const headingText = heading.length > 0 ? cleanText(heading.text()) : '';
    return headingText || joinedText(link.get());
  }

  /**
   * Nearest enclosing block element of the link
   */
  protected containerOf(link: Link, selector: string): Element | undefined {
    const node = link.parent().closest(selector).get(0);
    return node && isTag(node) ? node : undefined;
  }
}
