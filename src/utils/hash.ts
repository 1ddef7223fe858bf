import { createHash } from 'crypto';

export const JOB_ID_LENGTH = 16;

/**
 * Generates the content-addressed job id from:
 * - url
 * - title
 * - company
 *
 * The composite is lowercased before hashing, so casing differences between
 * sources collapse to the same id. The SHA-256 digest is cut to 16 hex chars;
 * the collision odds at tens of thousands of records are accepted.
 */
export function generateJobId(url: string, title: string, company: string): string {
  const hashInput = `${url}:${title}:${company}`.toLowerCase();
  return createHash('sha256').update(hashInput).digest('hex').slice(0, JOB_ID_LENGTH);
}
