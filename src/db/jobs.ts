import type { JobStore } from './store';
import {
  type BlankFieldFill,
  ENRICHABLE_FIELDS,
  type EnrichableField,
  type JobUpdate,
  type StoredJob,
} from '../types/job';
import { type JobRow, jobRowSchema } from '../types/schemas';
import { logger } from '../utils/logger';

/**
 * The part of a pg Pool or PoolClient the repository uses
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: Record<string, unknown>[] }>;
}

const JOB_COLUMNS = `id, title, company, location, url, source, raw_text, description,
  received_at, status, score, analysis, cover_letter, created_at, updated_at`;

const UPDATE_COLUMNS: ReadonlyArray<readonly [field: keyof JobUpdate, column: string]> = [
  ['location', 'location'],
  ['description', 'description'],
  ['rawText', 'raw_text'],
  ['status', 'status'],
  ['score', 'score'],
  ['analysis', 'analysis'],
  ['coverLetter', 'cover_letter'],
  ['updatedAt', 'updated_at'],
];

const ENRICHABLE_COLUMNS: Record<EnrichableField, string> = {
  location: 'location',
  description: 'description',
  rawText: 'raw_text',
};

export function rowToJob(row: JobRow): StoredJob {
  return {
    id: row.id,
    title: row.title,
    company: row.company,
    location: row.location,
    url: row.url,
    source: row.source,
    rawText: row.raw_text,
    ...(row.description !== null ? { description: row.description } : {}),
    receivedAt: row.received_at,
    status: row.status,
    score: row.score,
    analysis: row.analysis,
    coverLetter: row.cover_letter,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Database operations for jobs
 * Enforces global deduplication at the database level
 */
export class JobsRepository implements JobStore {
  constructor(private readonly db: Queryable) {}

  async get(id: string): Promise<StoredJob | null> {
    const result = await this.db.query(`SELECT ${JOB_COLUMNS} FROM jobs WHERE id = $1`, [id]);
    if (result.rows.length === 0) return null;
    return rowToJob(jobRowSchema.parse(result.rows[0]));
  }

  /**
   * Inserts a job if it doesn't already exist (based on id)
   * Returns true if inserted, false if duplicate
   */
  async insertIfAbsent(job: StoredJob): Promise<boolean> {
    try {
      const result = await this.db.query(
        `INSERT INTO jobs (${JOB_COLUMNS})
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)
        ON CONFLICT (id) DO NOTHING
        RETURNING id`,
        [
          job.id,
          job.title,
          job.company,
          job.location,
          job.url,
          job.source,
          job.rawText,
          job.description ?? null,
          job.receivedAt,
          job.status,
          job.score,
          job.analysis === null ? null : JSON.stringify(job.analysis),
          job.coverLetter,
          job.createdAt,
          job.updatedAt,
        ]
      );

      return result.rows.length > 0;
    } catch (error) {
      logger.error(`Error inserting job`, error, { id: job.id, title: job.title });
      throw error;
    }
  }

  /**
   * Writes the given fields; updated_at defaults to NOW() when not supplied
   */
  async updateFields(id: string, fields: JobUpdate): Promise<void> {
    const assignments: string[] = [];
    const values: unknown[] = [];

    for (const [field, column] of UPDATE_COLUMNS) {
      const value = fields[field];
      if (value === undefined) continue;
      values.push(field === 'analysis' && value !== null ? JSON.stringify(value) : value);
      assignments.push(`${column} = $${values.length}`);
    }

    if (assignments.length === 0) return;
    if (fields.updatedAt === undefined) {
      assignments.push('updated_at = NOW()');
    }

    values.push(id);
    try {
      await this.db.query(
        `UPDATE jobs SET ${assignments.join(', ')} WHERE id = $${values.length}`,
        values
      );
    } catch (error) {
      logger.error(`Error updating job`, error, { id, fields: Object.keys(fields) });
      throw error;
    }
  }

  /**
   * Fills only columns that are still blank; a concurrent fill that got
   * there first wins
   */
  async fillBlankFields(id: string, fields: BlankFieldFill, updatedAt: Date): Promise<boolean> {
    const assignments: string[] = [];
    const blankChecks: string[] = [];
    const values: unknown[] = [];

    for (const field of ENRICHABLE_FIELDS) {
      const value = fields[field];
      if (!value) continue;
      const column = ENRICHABLE_COLUMNS[field];
      values.push(value);
      assignments.push(
        `${column} = CASE WHEN ${column} IS NULL OR ${column} = '' THEN $${values.length} ELSE ${column} END`
      );
      blankChecks.push(`${column} IS NULL OR ${column} = ''`);
    }

    if (assignments.length === 0) return false;

    values.push(updatedAt);
    assignments.push(`updated_at = $${values.length}`);
    values.push(id);

    try {
      const result = await this.db.query(
        `UPDATE jobs SET ${assignments.join(', ')} ` +
          `WHERE id = $${values.length} AND (${blankChecks.join(' OR ')}) RETURNING id`,
        values
      );
      return result.rows.length > 0;
    } catch (error) {
      logger.error(`Error filling job fields`, error, { id, fields: Object.keys(fields) });
      throw error;
    }
  }
}
