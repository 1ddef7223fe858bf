import { type JobCandidate } from './base';
import { HtmlEmailParser, type Link } from './html-email';
import type { ParserSourceId } from '../types/job';
import { joinedText } from '../utils/html';

const FIELD_SEPARATOR = '·';

/**
 * LinkedIn job alert email parser
 * Cards render as "Title · Company · Location" inside a table cell
 */
export class LinkedInParser extends HtmlEmailParser {
  readonly source: ParserSourceId = 'linkedin';
  protected readonly linkPattern = /linkedin\.com\/(?:comm\/)?jobs\/view\//i;
  protected readonly excludedText = ['jobs you may be interested in', 'premium', 'try for free'];

  protected extract(link: Link, url: string, receivedAt: Date): JobCandidate | null {
    const title = this.titleFrom(link);
    if (!this.isUsableTitle(title)) return null;

    const container = this.containerOf(link, 'td, div, tr');
    if (!container) {
      return { url, title, rawText: title, receivedAt };
    }

    const blockText = joinedText(container);
    const [, company = '', location = ''] = splitCard(blockText, title);

    return { url, title, company, location, rawText: blockText, receivedAt };
  }
}

/**
 * Splits a card's text on the middle dot into [title, company, location, ...].
 * When the title and company share a segment ("Engineer Acme Corp · Remote"),
 * the title prefix is cut off and the remainder becomes the company segment.
 */
export function splitCard(blockText: string, title: string): string[] {
  const segments = blockText
    .split(FIELD_SEPARATOR)
    .map(segment => segment.trim())
    .filter(segment => segment.length > 0);

  if (segments.length === 0) return [title];

  const first = segments[0];
  if (first.toLowerCase().startsWith(title.toLowerCase())) {
    const remainder = first.slice(title.length).trim();
    return remainder ? [title, remainder, ...segments.slice(1)] : [title, ...segments.slice(1)];
  }

  return segments;
}
