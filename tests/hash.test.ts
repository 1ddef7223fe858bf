import { createHash } from 'crypto';
import { describe, expect, it } from 'vitest';
import { JOB_ID_LENGTH, generateJobId } from '../src/utils/hash';

describe('generateJobId', () => {
  it('is deterministic', () => {
    const a = generateJobId('https://example.com/jobs/1', 'Backend Engineer', 'Acme Corp');
    const b = generateJobId('https://example.com/jobs/1', 'Backend Engineer', 'Acme Corp');
    expect(a).toBe(b);
  });

  it('is a 16 character hex prefix of the sha256 of the lowercased composite', () => {
    const expected = createHash('sha256')
      .update('https://example.com/jobs/1:backend engineer:acme corp')
      .digest('hex')
      .slice(0, 16);

    const id = generateJobId('https://example.com/jobs/1', 'Backend Engineer', 'Acme Corp');
    expect(id).toBe(expected);
    expect(id).toMatch(/^[0-9a-f]{16}$/);
    expect(JOB_ID_LENGTH).toBe(16);
  });

  it('ignores casing differences', () => {
    expect(generateJobId('https://EXAMPLE.com/jobs/1', 'BACKEND engineer', 'acme CORP')).toBe(
      generateJobId('https://example.com/jobs/1', 'Backend Engineer', 'Acme Corp')
    );
  });

  it('changes when any defining field changes', () => {
    const base = generateJobId('https://example.com/jobs/1', 'Backend Engineer', 'Acme Corp');
    expect(generateJobId('https://example.com/jobs/2', 'Backend Engineer', 'Acme Corp')).not.toBe(base);
    expect(generateJobId('https://example.com/jobs/1', 'Frontend Engineer', 'Acme Corp')).not.toBe(base);
    expect(generateJobId('https://example.com/jobs/1', 'Backend Engineer', 'Globex')).not.toBe(base);
  });
});
