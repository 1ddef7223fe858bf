import type { IngestionPipeline, MergeOutcome } from './ingestion';
import { buildCanonicalJob } from '../sources/base';
import { detectSourceFromUrl } from '../sources/detector';
import {
  type CanonicalJob,
  ENRICHABLE_FIELDS,
  type EnrichableField,
  FIELD_LIMITS,
  type SourceId,
  isSourceId,
} from '../types/job';
import { captureSubmissionSchema } from '../types/schemas';
import { CaptureValidationError } from '../errors';
import { type Logger, logger } from '../utils/logger';

const NON_LOCATION_FIELDS: readonly EnrichableField[] = ENRICHABLE_FIELDS.filter(
  field => field !== 'location'
);

export interface CaptureResult {
  status: MergeOutcome['status'];
  id: string;
  job: CanonicalJob;
}

/**
 * Stores a single posting submitted from a browser page.
 * Re-capturing a known posting fills blank fields on the stored record.
 */
export class CaptureService {
  private readonly log: Logger;

  constructor(
    private readonly pipeline: IngestionPipeline,
    private readonly now: () => Date = () => new Date(),
    log?: Logger
  ) {
    this.log = log ?? logger.child('capture');
  }

  async capture(submission: unknown): Promise<CaptureResult> {
    const parsed = captureSubmissionSchema.safeParse(submission);
    if (!parsed.success) {
      throw new CaptureValidationError(parsed.error.issues);
    }

    const { url, title, company, location, description, source: hint } = parsed.data;
    const source: SourceId =
      detectSourceFromUrl(url) ?? (hint && isSourceId(hint) ? hint : 'extension');

    const job = buildCanonicalJob(
      source,
      {
        url,
        title,
        company,
        location: location || 'Remote',
        rawText: description,
        description,
        receivedAt: this.now(),
      },
      this.log,
      FIELD_LIMITS.captureDescription
    );

    if (!job) {
      // Passed the submission schema but cleaned down to an empty title or url
      throw new CaptureValidationError([
        { code: 'custom', path: [], message: 'submission has no usable url or title' },
      ]);
    }

    // The "Remote" default applies to new records only, never to an enrichment
    const outcome = await this.pipeline.mergeJob(job, {
      enrich: true,
      enrichFields: location ? ENRICHABLE_FIELDS : NON_LOCATION_FIELDS,
    });
    this.log.info(`Captured job ${outcome.status}`, { id: job.id, source, url: job.url });

    return { status: outcome.status, id: job.id, job };
  }
}
