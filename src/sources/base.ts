import {
  type CanonicalJob,
  FIELD_LIMITS,
  type ParserSourceId,
  type SourceId,
  UNKNOWN_COMPANY,
} from '../types/job';
import { canonicalJobSchema } from '../types/schemas';
import { generateJobId } from '../utils/hash';
import { cleanText, cleanUrl, containsAny, truncate } from '../utils/normalize';
import { type Logger, logger } from '../utils/logger';

/**
 * Common capability of every source parser
 */
export interface JobParser {
  /**
   * Source id this parser handles
   */
  readonly source: ParserSourceId;

  /**
   * Extracts canonical jobs from one email body or feed document.
   * Resolves to [] when nothing recognizable is found; rejects with
   * SourceParseError only when the document cannot be read at all.
   */
  parse(rawContent: string, receivedAt: Date): Promise<CanonicalJob[]>;
}

/**
 * Fields a parser has pulled out of the markup, before normalization
 */
export interface JobCandidate {
  url: string;
  title: string;
  company?: string;
  location?: string;
  rawText?: string;
  description?: string;
  receivedAt: Date;
}

/**
 * Link text that is email chrome rather than a job title
 */
export const COMMON_EXCLUDED_TEXT = [
  'unsubscribe',
  'view all',
  'see all',
  'see more jobs',
  'manage alert',
  'manage your',
  'notification',
  'privacy policy',
  'help center',
  'homepage',
] as const;

const LOCATION_HINTS = ['remote', 'hybrid', 'on-site', 'onsite', 'anywhere', 'worldwide'];

const CURRENCY_PATTERN = /[$€£¥₹]/;

export function hasCurrency(text: string): boolean {
  return CURRENCY_PATTERN.test(text);
}

/**
 * Loose location check used when a block has no fixed field order
 */
export function looksLikeLocation(text: string): boolean {
  return containsAny(text, LOCATION_HINTS) || (text.includes(',') && !hasCurrency(text));
}

const AT_COMPANY = /^at\s+(.+)$/i;

/**
 * Company named by an "at Acme Corp" segment, if any
 */
export function companyFromAtSegment(segments: string[]): string | undefined {
  for (const segment of segments) {
    const match = segment.match(AT_COMPANY);
    if (match) return match[1].trim();
  }
  return undefined;
}

/**
 * Builds a canonical job from already-extracted fields.
 * Returns null (and logs) when the result is not a valid record.
 */
export function buildCanonicalJob(
  source: SourceId,
  candidate: JobCandidate,
  log: Logger = logger,
  descriptionLimit: number = FIELD_LIMITS.feedDescription
): CanonicalJob | null {
  const url = cleanUrl(candidate.url);
  const title = truncate(cleanText(candidate.title), FIELD_LIMITS.title);
  const company =
    truncate(cleanText(candidate.company ?? ''), FIELD_LIMITS.company) || UNKNOWN_COMPANY;
  const location = truncate(cleanText(candidate.location ?? ''), FIELD_LIMITS.location);
  const rawText = truncate(cleanText(candidate.rawText ?? ''), FIELD_LIMITS.rawText);
  const description =
    candidate.description !== undefined
      ? truncate(cleanText(candidate.description), descriptionLimit)
      : undefined;

  const job: CanonicalJob = {
    id: generateJobId(url, title, company),
    title,
    company,
    location,
    url,
    source,
    rawText,
    ...(description !== undefined ? { description } : {}),
    receivedAt: candidate.receivedAt,
  };

  const result = canonicalJobSchema.safeParse(job);
  if (!result.success) {
    log.debug('Skipping malformed item', {
      url: candidate.url,
      title: candidate.title,
      issues: result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
    return null;
  }

  return Object.freeze(job);
}

/**
 * Shared parser policies: exclusion denylist, minimum title length
 * and canonical record construction
 */
export abstract class BaseParser implements JobParser {
  abstract readonly source: ParserSourceId;

  /**
   * Source-specific denylist, checked together with COMMON_EXCLUDED_TEXT
   */
  protected readonly excludedText: readonly string[] = [];

  protected readonly minTitleLength: number = 3;

  private scopedLogger?: Logger;

  protected get log(): Logger {
    if (!this.scopedLogger) {
      this.scopedLogger = logger.child(this.source);
    }
    return this.scopedLogger;
  }

  abstract parse(rawContent: string, receivedAt: Date): Promise<CanonicalJob[]>;

  protected isExcluded(text: string): boolean {
    return containsAny(text, COMMON_EXCLUDED_TEXT) || containsAny(text, this.excludedText);
  }

  protected isUsableTitle(title: string): boolean {
    return title.length >= this.minTitleLength && !this.isExcluded(title);
  }

  protected buildJob(candidate: JobCandidate): CanonicalJob | null {
    return buildCanonicalJob(this.source, candidate, this.log);
  }
}
