import { beforeEach, describe, expect, it } from 'vitest';
import { IngestionPipeline, dedupeById } from '../src/services/ingestion';
import { ParserRegistry, createParserRegistry } from '../src/sources';
import { SourceParseError, UnrecognizedSourceError } from '../src/errors';
import { type CanonicalJob, PARSER_SOURCE_IDS } from '../src/types/job';
import { generateJobId } from '../src/utils/hash';
import { loadFixture } from './helpers/fixtures';
import { MemoryJobStore } from './helpers/memory-store';

const receivedAt = new Date('2026-03-10T08:00:00Z');
const now = new Date('2026-03-10T09:00:00Z');
const ACME_URL = 'https://www.linkedin.com/jobs/view/123/';
const ACME_ID = generateJobId(ACME_URL, 'Senior Backend Engineer', 'Acme Corp');

function canonical(overrides: Partial<CanonicalJob> = {}): CanonicalJob {
  return {
    id: ACME_ID,
    title: 'Senior Backend Engineer',
    company: 'Acme Corp',
    location: 'Remote',
    url: ACME_URL,
    source: 'linkedin',
    rawText: 'Senior Backend Engineer · Acme Corp · Remote',
    receivedAt,
    ...overrides,
  };
}

describe('IngestionPipeline', () => {
  let store: MemoryJobStore;
  let pipeline: IngestionPipeline;

  beforeEach(() => {
    store = new MemoryJobStore();
    pipeline = new IngestionPipeline({
      registry: createParserRegistry({ enabledSources: [...PARSER_SOURCE_IDS], lookbackDays: 7 }),
      store,
      now: () => now,
    });
  });

  describe('ingest', () => {
    it('stores new jobs with storage defaults', async () => {
      const inserted = await pipeline.ingest(loadFixture('linkedin-alert.html'), receivedAt);

      expect(inserted).toHaveLength(2);
      expect(inserted[0]).toMatchObject({
        id: ACME_ID,
        title: 'Senior Backend Engineer',
        company: 'Acme Corp',
        location: 'Remote',
        source: 'linkedin',
        status: 'new',
        score: 0,
        analysis: null,
        coverLetter: null,
        createdAt: now,
        updatedAt: now,
      });
      expect(store.records.size).toBe(2);
    });

    it('is idempotent and leaves downstream fields alone', async () => {
      await pipeline.ingest(loadFixture('linkedin-alert.html'), receivedAt);
      await store.updateFields(ACME_ID, {
        status: 'applied',
        score: 87,
        analysis: { qualificationScore: 87, shouldApply: true },
        coverLetter: 'Dear Acme',
      });

      const second = await pipeline.ingest(loadFixture('linkedin-alert.html'), receivedAt);

      expect(second).toEqual([]);
      expect(store.records.size).toBe(2);
      expect(store.records.get(ACME_ID)).toMatchObject({
        status: 'applied',
        score: 87,
        analysis: { qualificationScore: 87, shouldApply: true },
        coverLetter: 'Dear Acme',
      });
    });

    it('collapses near-variants of the same posting', async () => {
      await pipeline.ingest(loadFixture('linkedin-alert.html'), receivedAt);

      const variant = `<div><table><tr><td>
        <a href="https://www.linkedin.com/comm/jobs/view/123/?trackingId=zzz&amp;lipi=abc#apply"><span>Senior Backend Engineer</span></a>
        · Acme Corp · Remote
      </td></tr></table><p>Footer text</p></div>`;
      const inserted = await pipeline.ingest(variant, new Date('2026-03-11T08:00:00Z'));

      expect(inserted).toEqual([]);
      expect(store.records.size).toBe(2);
    });

    it('prefers a registered hint and falls back to detection', async () => {
      const inserted = await pipeline.ingest(loadFixture('linkedin-alert.html'), receivedAt, 'monster');
      expect(inserted.map(job => job.source)).toEqual(['linkedin', 'linkedin']);
    });

    it('returns nothing for recognized content without jobs', async () => {
      const html = '<a href="https://www.linkedin.com/jobs/view/">x</a>';
      expect(await pipeline.ingest(html, receivedAt)).toEqual([]);
    });

    it('rejects content no parser recognizes', async () => {
      await expect(pipeline.ingest('<p>Hello</p>', receivedAt)).rejects.toBeInstanceOf(
        UnrecognizedSourceError
      );
      await expect(pipeline.ingest('<p>Hello</p>', receivedAt, 'monster')).rejects.toThrow(
        'Unrecognized source: no parser registered for hint "monster" and none detected'
      );
    });

    it('wraps parser failures with the source id', async () => {
      const failing = new IngestionPipeline({
        registry: new ParserRegistry({
          linkedin: () => ({
            source: 'linkedin',
            parse: async () => {
              throw new Error('boom');
            },
          }),
        }),
        store,
      });

      const result = failing.ingest('<p>x</p>', receivedAt, 'linkedin');
      await expect(result).rejects.toBeInstanceOf(SourceParseError);
      await expect(result).rejects.toThrow('Failed to parse linkedin content: boom');
    });
  });

  describe('ingestMany', () => {
    it('reports counts and records failed sources without throwing', async () => {
      const report = await pipeline.ingestMany([
        { rawContent: loadFixture('linkedin-alert.html'), receivedAt, origin: 'mail:linkedin' },
        { rawContent: '<p>Weekly digest</p>', receivedAt, origin: 'mail:unknown' },
        { rawContent: loadFixture('linkedin-alert.html'), receivedAt, origin: 'mail:linkedin-2' },
        {
          rawContent: 'this is not a feed',
          receivedAt,
          sourceHint: 'weworkremotely',
          origin: 'https://weworkremotely.com/remote-jobs.rss',
        },
      ]);

      expect(report.found).toBe(2);
      expect(report.new).toBe(2);
      expect(report.inserted).toHaveLength(2);
      expect(report.failedSources).toHaveLength(2);
      expect(report.failedSources[0]).toEqual({
        origin: 'mail:unknown',
        reason: 'unrecognized',
        message: 'Unrecognized source: no parser detected for content',
      });
      expect(report.failedSources[1]).toMatchObject({
        origin: 'https://weworkremotely.com/remote-jobs.rss',
        source: 'weworkremotely',
        reason: 'parse_error',
      });
      expect(report.failedSources[1].message).toMatch(/^Failed to parse weworkremotely content: /);
    });

    it('reports zero new jobs when a batch repeats', async () => {
      const batch = [
        { rawContent: loadFixture('indeed-alert.html'), receivedAt, origin: 'mail:indeed' },
      ];

      const first = await pipeline.ingestMany(batch);
      const firstId = first.inserted[0].id;
      await store.updateFields(firstId, { status: 'interested' });
      const second = await pipeline.ingestMany(batch);

      expect(first.new).toBe(2);
      expect(second.found).toBe(2);
      expect(second.new).toBe(0);
      expect(store.records.get(firstId)?.status).toBe('interested');
    });
  });

  describe('mergeJob', () => {
    it('creates, then leaves an existing record unchanged', async () => {
      const created = await pipeline.mergeJob(canonical());
      const again = await pipeline.mergeJob(canonical({ location: 'Hybrid' }));

      expect(created.status).toBe('created');
      expect(again).toEqual({ status: 'unchanged', id: ACME_ID });
      expect(store.records.get(ACME_ID)?.location).toBe('Remote');
    });

    it('fills only blank fields when enriching', async () => {
      await pipeline.mergeJob(canonical({ location: '', rawText: '' }));
      await store.updateFields(ACME_ID, { status: 'applied' });

      const outcome = await pipeline.mergeJob(
        canonical({ location: 'Remote', rawText: 'Full card', description: 'Build services' }),
        { enrich: true }
      );

      expect(outcome).toEqual({ status: 'updated', id: ACME_ID });
      expect(store.records.get(ACME_ID)).toMatchObject({
        location: 'Remote',
        rawText: 'Full card',
        description: 'Build services',
        status: 'applied',
        updatedAt: now,
      });
    });

    it('does not overwrite populated fields when enriching', async () => {
      await pipeline.mergeJob(canonical());

      const outcome = await pipeline.mergeJob(canonical({ location: 'Hybrid', rawText: 'Other' }), {
        enrich: true,
      });

      expect(outcome.status).toBe('unchanged');
      expect(store.records.get(ACME_ID)).toMatchObject({
        location: 'Remote',
        rawText: 'Senior Backend Engineer · Acme Corp · Remote',
      });
    });

    it('restricts enrichment to the requested fields', async () => {
      await pipeline.mergeJob(canonical({ location: '', rawText: '' }));

      const outcome = await pipeline.mergeJob(canonical({ location: 'Remote', rawText: 'Full card' }), {
        enrich: true,
        enrichFields: ['description', 'rawText'],
      });

      expect(outcome.status).toBe('updated');
      expect(store.records.get(ACME_ID)).toMatchObject({ location: '', rawText: 'Full card' });
    });

    it('lets the first of two overlapping enrichments win', async () => {
      await pipeline.mergeJob(canonical());

      const outcomes = await Promise.all([
        pipeline.mergeJob(canonical({ description: 'first description' }), { enrich: true }),
        pipeline.mergeJob(canonical({ description: 'second description' }), { enrich: true }),
      ]);

      expect(outcomes.map(outcome => outcome.status)).toEqual(['updated', 'unchanged']);
      expect(store.records.get(ACME_ID)?.description).toBe('first description');
    });
  });
});

describe('dedupeById', () => {
  it('keeps the last occurrence of each id', () => {
    const jobs = dedupeById([
      canonical({ rawText: 'first' }),
      canonical({ id: 'aaaaaaaaaaaaaaaa', url: 'https://example.com/other' }),
      canonical({ rawText: 'second' }),
    ]);

    expect(jobs).toHaveLength(2);
    expect(jobs[0].rawText).toBe('second');
  });
});
