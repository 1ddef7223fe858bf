/**
 * Canonical job schema
 * Every source parser must produce this structure
 */

export const SOURCE_IDS = [
  'linkedin',
  'indeed',
  'greenhouse',
  'wellfound',
  'weworkremotely',
  'extension',
] as const;

export type SourceId = (typeof SOURCE_IDS)[number];

/**
 * Sources that have a parser ('extension' postings arrive pre-extracted)
 */
export type ParserSourceId = Exclude<SourceId, 'extension'>;

export const PARSER_SOURCE_IDS: readonly ParserSourceId[] = [
  'linkedin',
  'indeed',
  'greenhouse',
  'wellfound',
  'weworkremotely',
];

export const JOB_STATUSES = [
  'new',
  'interested',
  'applied',
  'interviewing',
  'passed',
  'rejected',
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const FIELD_LIMITS = {
  title: 200,
  company: 100,
  location: 100,
  rawText: 1000,
  feedDescription: 2000,
  captureDescription: 5000,
} as const;

export const UNKNOWN_COMPANY = 'Unknown';

export interface CanonicalJob {
  readonly id: string;
  readonly title: string;
  readonly company: string;
  readonly location: string;
  readonly url: string;
  readonly source: SourceId;
  readonly rawText: string;
  readonly description?: string;
  readonly receivedAt: Date;
}

/**
 * Written back by the scoring stage; shape is owned by that stage
 */
export interface JobAnalysis {
  qualificationScore?: number;
  shouldApply?: boolean;
  strengths?: string[];
  gaps?: string[];
  recommendation?: string;
  [key: string]: unknown;
}

/**
 * Job as persisted, with storage-owned and downstream fields
 */
export interface StoredJob extends CanonicalJob {
  status: JobStatus;
  score: number;
  analysis: JobAnalysis | null;
  coverLetter: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Fields the merge step may fill on an existing record when they are blank
 */
export type EnrichableField = 'location' | 'description' | 'rawText';

export const ENRICHABLE_FIELDS: readonly EnrichableField[] = ['location', 'description', 'rawText'];

export type BlankFieldFill = Partial<Record<EnrichableField, string>>;

/**
 * Fields any caller may write on an existing record
 */
export interface JobUpdate {
  location?: string;
  description?: string;
  rawText?: string;
  status?: JobStatus;
  score?: number;
  analysis?: JobAnalysis | null;
  coverLetter?: string | null;
  updatedAt?: Date;
}

/**
 * Raw content handed to the ingestion pipeline by a fetcher
 */
export interface RawContent {
  rawContent: string;
  receivedAt: Date;
  sourceHint?: string;
  /** Where the content came from (feed URL, mail query), for reporting */
  origin: string;
}

export function isSourceId(value: string): value is SourceId {
  return SOURCE_IDS.some(id => id === value);
}
