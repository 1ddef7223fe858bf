import type { JobStore } from '../db/store';
import type { JobParser } from '../sources/base';
import { detectSource } from '../sources/detector';
import type { ParserRegistry } from '../sources';
import {
  type BlankFieldFill,
  type CanonicalJob,
  ENRICHABLE_FIELDS,
  type EnrichableField,
  type RawContent,
  type StoredJob,
} from '../types/job';
import { SourceParseError, UnrecognizedSourceError } from '../errors';
import { type Logger, logger } from '../utils/logger';

export interface MergeOptions {
  /**
   * Fill blank location, description and rawText on an existing record
   */
  enrich?: boolean;
  /**
   * Fields enrichment may fill; defaults to all enrichable fields
   */
  enrichFields?: readonly EnrichableField[];
}

export type MergeOutcome =
  | { status: 'created'; record: StoredJob }
  | { status: 'updated' | 'unchanged'; id: string };

export interface FailedSource {
  origin: string;
  source?: string;
  reason: 'unrecognized' | 'parse_error' | 'fetch_error';
  message: string;
}

export interface IngestReport {
  /** Unique candidates across the batch */
  found: number;
  new: number;
  inserted: StoredJob[];
  failedSources: FailedSource[];
}

export interface IngestionPipelineDeps {
  registry: ParserRegistry;
  store: JobStore;
  now?: () => Date;
  log?: Logger;
}

/**
 * Parses raw content into canonical jobs and merges them into the store
 */
export class IngestionPipeline {
  private readonly registry: ParserRegistry;
  private readonly store: JobStore;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(deps: IngestionPipelineDeps) {
    this.registry = deps.registry;
    this.store = deps.store;
    this.now = deps.now ?? (() => new Date());
    this.log = deps.log ?? logger.child('ingestion');
  }

  /**
   * Registered hint first, then content detection
   */
  resolveParser(rawContent: string, sourceHint?: string): JobParser {
    const hinted = sourceHint ? this.registry.get(sourceHint) : undefined;
    if (hinted) return hinted;

    const detected = detectSource(rawContent);
    const parser = detected ? this.registry.get(detected) : undefined;
    if (!parser) {
      throw new UnrecognizedSourceError(sourceHint);
    }
    return parser;
  }

  /**
   * Parses one document without touching the store
   */
  async extract(rawContent: string, receivedAt: Date, sourceHint?: string): Promise<CanonicalJob[]> {
    const parser = this.resolveParser(rawContent, sourceHint);
    try {
      return await parser.parse(rawContent, receivedAt);
    } catch (error) {
      if (error instanceof SourceParseError) throw error;
      throw new SourceParseError(parser.source, error);
    }
  }

  /**
   * Returns only the records newly stored by this call
   */
  async ingest(
    rawContent: string,
    receivedAt: Date,
    sourceHint?: string,
    options: MergeOptions = {}
  ): Promise<StoredJob[]> {
    const candidates = dedupeById(await this.extract(rawContent, receivedAt, sourceHint));
    const inserted = await this.mergeAll(candidates, options);

    this.log.info('Ingested content', {
      sourceHint,
      found: candidates.length,
      new: inserted.length,
    });

    return inserted;
  }

  /**
   * Ingests a batch. Unrecognized and unparseable documents are reported,
   * not thrown; store failures propagate.
   */
  async ingestMany(contents: RawContent[], options: MergeOptions = {}): Promise<IngestReport> {
    const failedSources: FailedSource[] = [];
    const candidates: CanonicalJob[] = [];

    for (const content of contents) {
      try {
        candidates.push(
          ...(await this.extract(content.rawContent, content.receivedAt, content.sourceHint))
        );
      } catch (error) {
        if (error instanceof UnrecognizedSourceError) {
          this.log.warn('Skipping content from unrecognized source', { origin: content.origin });
          failedSources.push({
            origin: content.origin,
            ...(content.sourceHint ? { source: content.sourceHint } : {}),
            reason: 'unrecognized',
            message: error.message,
          });
        } else if (error instanceof SourceParseError) {
          this.log.error(`Source ${error.source} failed to parse`, error, { origin: content.origin });
          failedSources.push({
            origin: content.origin,
            source: error.source,
            reason: 'parse_error',
            message: error.message,
          });
        } else {
          throw error;
        }
      }
    }

    const unique = dedupeById(candidates);
    const inserted = await this.mergeAll(unique, options);

    this.log.info('Batch ingestion complete', {
      documents: contents.length,
      found: unique.length,
      new: inserted.length,
      failedSources: failedSources.length,
    });

    return { found: unique.length, new: inserted.length, inserted, failedSources };
  }

  /**
   * Insert-if-absent. Existing records keep their storage-owned fields;
   * with enrich, only blank enrichable fields are filled.
   */
  async mergeJob(job: CanonicalJob, options: MergeOptions = {}): Promise<MergeOutcome> {
    const now = this.now();
    const record: StoredJob = {
      ...job,
      status: 'new',
      score: 0,
      analysis: null,
      coverLetter: null,
      createdAt: now,
      updatedAt: now,
    };

    if (await this.store.insertIfAbsent(record)) {
      return { status: 'created', record };
    }

    if (!options.enrich) {
      return { status: 'unchanged', id: job.id };
    }

    const fill: BlankFieldFill = {};
    for (const field of options.enrichFields ?? ENRICHABLE_FIELDS) {
      const incoming = job[field];
      if (incoming) fill[field] = incoming;
    }

    if (Object.keys(fill).length === 0 || !(await this.store.fillBlankFields(job.id, fill, now))) {
      return { status: 'unchanged', id: job.id };
    }

    this.log.debug('Enriched existing job', { id: job.id, fields: Object.keys(fill) });
    return { status: 'updated', id: job.id };
  }

  private async mergeAll(candidates: CanonicalJob[], options: MergeOptions): Promise<StoredJob[]> {
    const inserted: StoredJob[] = [];
    for (const candidate of candidates) {
      const outcome = await this.mergeJob(candidate, options);
      if (outcome.status === 'created') {
        inserted.push(outcome.record);
      }
    }
    return inserted;
  }
}

/**
 * Last occurrence of each id wins
 */
export function dedupeById(jobs: CanonicalJob[]): CanonicalJob[] {
  const byId = new Map<string, CanonicalJob>();
  for (const job of jobs) {
    byId.set(job.id, job);
  }
  return Array.from(byId.values());
}
