import type { JobStore } from '../../src/db/store';
import {
  type BlankFieldFill,
  ENRICHABLE_FIELDS,
  type JobUpdate,
  type StoredJob,
} from '../../src/types/job';

/**
 * In-process JobStore with the same insert-if-absent contract as the pg repository
 */
export class MemoryJobStore implements JobStore {
  readonly records = new Map<string, StoredJob>();

  async get(id: string): Promise<StoredJob | null> {
    const record = this.records.get(id);
    return record ? { ...record } : null;
  }

  async insertIfAbsent(job: StoredJob): Promise<boolean> {
    if (this.records.has(job.id)) return false;
    this.records.set(job.id, { ...job });
    return true;
  }

  async updateFields(id: string, fields: JobUpdate): Promise<void> {
    const record = this.records.get(id);
    if (!record) return;
    this.records.set(id, { ...record, ...fields, updatedAt: fields.updatedAt ?? new Date() });
  }

  async fillBlankFields(id: string, fields: BlankFieldFill, updatedAt: Date): Promise<boolean> {
    const record = this.records.get(id);
    if (!record) return false;

    const filled: BlankFieldFill = {};
    for (const field of ENRICHABLE_FIELDS) {
      const value = fields[field];
      if (value && !record[field]) filled[field] = value;
    }
    if (Object.keys(filled).length === 0) return false;

    this.records.set(id, { ...record, ...filled, updatedAt });
    return true;
  }
}
