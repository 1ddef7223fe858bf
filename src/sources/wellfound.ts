import { type JobCandidate, companyFromAtSegment, hasCurrency, looksLikeLocation } from './base';
import { HtmlEmailParser, type Link } from './html-email';
import type { ParserSourceId } from '../types/job';
import { joinedText } from '../utils/html';
import { humanizeSlug } from '../utils/normalize';

const COMPANY_SLUG = /\/company\/([^/?#]+)/i;
const FIELD_SEPARATORS = /[•|]/;

export function companyFromProfileUrl(url: string): string | undefined {
  const slug = url.match(COMPANY_SLUG)?.[1];
  return slug ? humanizeSlug(decodeURIComponent(slug)) : undefined;
}

/**
 * Wellfound (formerly AngelList) email parser
 * Rows read "Title • Location • Salary • Equity"
 */
export class WellfoundParser extends HtmlEmailParser {
  readonly source: ParserSourceId = 'wellfound';
  protected readonly linkPattern = /(?:wellfound\.com|angel\.co)\/(?:[^?#]*\/)?jobs\/\d+/i;
  protected readonly excludedText = [
    'apply now',
    'view job',
    'see more',
    'update your preferences',
  ];

  protected extract(link: Link, url: string, receivedAt: Date): JobCandidate | null {
    const title = this.titleFrom(link);
    if (!this.isUsableTitle(title)) return null;

    const container = this.containerOf(link, 'td, div, li, tr');
    const blockText = container ? joinedText(container) : title;

    const segments = blockText
      .split(FIELD_SEPARATORS)
      .map(segment => segment.trim())
      .filter(segment => segment.length > 0);
    const others = segments.filter(
      segment => segment.toLowerCase() !== title.toLowerCase() && !segment.startsWith(title)
    );

    const company = companyFromProfileUrl(url) ?? companyFromAtSegment(others) ?? '';
    const location =
      others.find(
        segment =>
          !/^at\s/i.test(segment) && !hasCurrency(segment) && looksLikeLocation(segment)
      ) ?? '';

    return { url, title, company, location, rawText: blockText, receivedAt };
  }
}
