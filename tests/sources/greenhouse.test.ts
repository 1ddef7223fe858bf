import { describe, expect, it } from 'vitest';
import { GreenhouseParser, companyFromBoardUrl } from '../../src/sources/greenhouse';
import { loadFixture } from '../helpers/fixtures';

const receivedAt = new Date('2026-03-10T08:00:00Z');

describe('GreenhouseParser', () => {
  const parser = new GreenhouseParser();

  it('extracts board and careers-page links', async () => {
    const jobs = await parser.parse(loadFixture('greenhouse-alert.html'), receivedAt);

    expect(jobs).toHaveLength(2);
    expect(jobs[0]).toMatchObject({
      title: 'Site Reliability Engineer',
      company: 'Acme Corp',
      location: 'San Francisco, CA',
      url: 'https://boards.greenhouse.io/acme-corp/jobs/4012345',
      source: 'greenhouse',
      rawText: 'Site Reliability Engineer San Francisco, CA',
    });
    expect(jobs[1]).toMatchObject({
      title: 'Product Designer',
      company: 'Initech',
      location: 'Remote - US',
      url: 'https://www.initech.com/careers?gh_jid=778899',
    });
  });

  it('keeps a location segment that also appears inside the title', async () => {
    const html =
      '<div><a href="https://boards.greenhouse.io/globex/jobs/555"><b>Remote Backend Engineer</b></a><p>Remote</p></div>';

    const [job] = await parser.parse(html, receivedAt);

    expect(job).toMatchObject({
      title: 'Remote Backend Engineer',
      company: 'Globex',
      location: 'Remote',
      rawText: 'Remote Backend Engineer Remote',
    });
  });
});

describe('companyFromBoardUrl', () => {
  it('humanizes the board slug', () => {
    expect(companyFromBoardUrl('https://boards.greenhouse.io/acme-corp/jobs/1')).toBe('Acme Corp');
  });

  it('ignores embedded boards and other URLs', () => {
    expect(companyFromBoardUrl('https://boards.greenhouse.io/embed/jobs/1')).toBeUndefined();
    expect(companyFromBoardUrl('https://www.initech.com/careers?gh_jid=1')).toBeUndefined();
  });
});
