import type { ParserSourceId, SourceId } from '../types/job';

/**
 * Content markers in priority order; the first marker found wins
 */
export const SOURCE_MARKERS: ReadonlyArray<readonly [marker: string, source: ParserSourceId]> = [
  ['linkedin.com/jobs/view', 'linkedin'],
  ['linkedin.com/comm/jobs', 'linkedin'],
  ['indeed.com/viewjob', 'indeed'],
  ['indeed.com/rc/clk', 'indeed'],
  ['greenhouse.io', 'greenhouse'],
  ['boards.greenhouse.io', 'greenhouse'],
  ['wellfound.com', 'wellfound'],
  ['angel.co', 'wellfound'],
  ['weworkremotely.com', 'weworkremotely'],
];

/**
 * Guesses which parser handles a piece of raw content
 */
export function detectSource(rawContent: string): ParserSourceId | null {
  const lower = rawContent.toLowerCase();

  for (const [marker, source] of SOURCE_MARKERS) {
    if (lower.includes(marker)) {
      return source;
    }
  }

  return null;
}

const URL_HOSTS: ReadonlyArray<readonly [host: string, source: SourceId]> = [
  ['linkedin.com', 'linkedin'],
  ['indeed.com', 'indeed'],
  ['weworkremotely.com', 'weworkremotely'],
  ['greenhouse.io', 'greenhouse'],
  ['wellfound.com', 'wellfound'],
  ['angel.co', 'wellfound'],
];

/**
 * Source of a single captured posting URL, or null for other sites
 */
export function detectSourceFromUrl(url: string): SourceId | null {
  const lower = url.toLowerCase();
  const match = URL_HOSTS.find(([host]) => lower.includes(host));
  return match ? match[1] : null;
}
