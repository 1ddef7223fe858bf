import { type JobCandidate, companyFromAtSegment, looksLikeLocation } from './base';
import { HtmlEmailParser, type Link } from './html-email';
import type { ParserSourceId } from '../types/job';
import { textSegments } from '../utils/html';
import { humanizeSlug } from '../utils/normalize';

const BOARD_SLUG = /greenhouse\.io\/([^/?#]+)\/jobs\//i;

/**
 * Company display name from a hosted board URL
 * (boards.greenhouse.io/acme-corp/jobs/123 -> "Acme Corp")
 */
export function companyFromBoardUrl(url: string): string | undefined {
  const slug = url.match(BOARD_SLUG)?.[1];
  if (!slug || slug.toLowerCase() === 'embed') return undefined;
  return humanizeSlug(decodeURIComponent(slug));
}

/**
 * Greenhouse ATS email parser
 * Links point at a hosted board (greenhouse.io/<board>/jobs/<id>) or at a
 * company careers page carrying gh_jid
 */
export class GreenhouseParser extends HtmlEmailParser {
  readonly source: ParserSourceId = 'greenhouse';
  protected readonly linkPattern = /greenhouse\.io\/[^/?#]+\/jobs\/\d+|[?&]gh_jid=\d+/i;
  protected readonly excludedText = ['apply now', 'view job', 'view opening', 'all openings'];

  protected extract(link: Link, url: string, receivedAt: Date): JobCandidate | null {
    const title = this.titleFrom(link);
    if (!this.isUsableTitle(title)) return null;

    const container = this.containerOf(link, 'td, div, li, tr');
    const segments = textSegments(container);
    const titleSegments = new Set(textSegments(link.get()).map(segment => segment.toLowerCase()));
    titleSegments.add(title.toLowerCase());
    const others = segments.filter(segment => !titleSegments.has(segment.toLowerCase()));

    const company = companyFromAtSegment(others) ?? companyFromBoardUrl(url) ?? '';
    const location =
      others.find(segment => !/^at\s/i.test(segment) && looksLikeLocation(segment)) ?? '';

    return {
      url,
      title,
      company,
      location,
      rawText: segments.length > 0 ? segments.join(' ') : title,
      receivedAt,
    };
  }
}
