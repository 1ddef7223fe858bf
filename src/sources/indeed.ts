import { type JobCandidate, hasCurrency } from './base';
import { HtmlEmailParser, type Link } from './html-email';
import type { ParserSourceId } from '../types/job';
import { joinedText, textSegments } from '../utils/html';
import usStates from '../data/us-states.json';

// "4.1 2,345 reviews" style rating lines
const RATING_LINE = /^\d+\.?\d*\s*\d/;
const STATE_CODE = new RegExp(`\\b(?:${usStates.join('|')})\\b`);

const COMPANY_SCAN_LINES = 3;
const LOCATION_SCAN_LINES = 2;
const RAW_TEXT_LINES = 6;

export function isRatingLine(line: string): boolean {
  return RATING_LINE.test(line);
}

export function isIndeedLocation(line: string): boolean {
  if (hasCurrency(line)) return false;
  return line.toLowerCase().includes('remote') || line.includes(',') || STATE_CODE.test(line);
}

/**
 * Indeed job alert email parser
 * Cards are stacked lines: title, rating, company, salary, location, snippet
 */
export class IndeedParser extends HtmlEmailParser {
  readonly source: ParserSourceId = 'indeed';
  protected readonly linkPattern = /indeed\.com.*(?:jk=|vjk=)[a-f0-9]+/i;
  protected readonly minTitleLength = 5;
  protected readonly excludedText = [
    'easily apply',
    'responsive employer',
    'messages',
    'job feed',
  ];

  protected extract(link: Link, url: string, receivedAt: Date): JobCandidate | null {
    const title = joinedText(link.get());
    if (!this.isUsableTitle(title)) return null;

    const container = this.containerOf(link, 'td, div, li');
    if (!container) {
      return { url, title, rawText: title, receivedAt };
    }

    const lines = textSegments(container).filter(line => line.length > 2);
    const { company, location } = scanCardLines(lines, title);

    return {
      url,
      title,
      company,
      location,
      rawText: lines.slice(0, RAW_TEXT_LINES).join(' '),
      receivedAt,
    };
  }
}

/**
 * Finds the company and location lines that follow the title line
 */
export function scanCardLines(
  lines: string[],
  title: string
): { company: string; location: string } {
  let titleEnd = lines.findIndex(
    line => !isRatingLine(line) && (line.includes(title) || title.includes(line))
  );
  if (titleEnd === -1) return { company: '', location: '' };

  // A title split over several text nodes spans several lines
  while (titleEnd + 1 < lines.length && title.includes(lines[titleEnd + 1])) {
    titleEnd++;
  }

  const companyLimit = Math.min(titleEnd + 1 + COMPANY_SCAN_LINES, lines.length);
  for (let j = titleEnd + 1; j < companyLimit; j++) {
    const line = lines[j];
    if (isRatingLine(line) || hasCurrency(line)) continue;

    let location = '';
    const locationLimit = Math.min(j + 1 + LOCATION_SCAN_LINES, lines.length);
    for (let k = j + 1; k < locationLimit; k++) {
      if (isIndeedLocation(lines[k])) {
        location = lines[k];
        break;
      }
    }
    return { company: line, location };
  }

  return { company: '', location: '' };
}
