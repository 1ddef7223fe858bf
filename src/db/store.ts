import type { BlankFieldFill, JobUpdate, StoredJob } from '../types/job';

/**
 * Persistence seam for stored jobs.
 * insertIfAbsent must be a single conditional write: it resolves to false
 * when a record with the same id already exists, including when a concurrent
 * writer got there first.
 * fillBlankFields writes each field only where the stored value is null or
 * empty, checked inside the same write; it resolves to true when any field
 * was filled.
 */
export interface JobStore {
  get(id: string): Promise<StoredJob | null>;
  insertIfAbsent(job: StoredJob): Promise<boolean>;
  updateFields(id: string, fields: JobUpdate): Promise<void>;
  fillBlankFields(id: string, fields: BlankFieldFill, updatedAt: Date): Promise<boolean>;
}
