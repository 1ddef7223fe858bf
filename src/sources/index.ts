import type { JobParser } from './base';
import { LinkedInParser } from './linkedin';
import { IndeedParser } from './indeed';
import { GreenhouseParser } from './greenhouse';
import { WellfoundParser } from './wellfound';
import { WeWorkRemotelyParser } from './weworkremotely';
import type { Config } from '../config';
import { PARSER_SOURCE_IDS, type ParserSourceId } from '../types/job';

export type ParserFactories = Readonly<Partial<Record<ParserSourceId, () => JobParser>>>;

/**
 * Maps source ids to parsers. Each parser is built on first use and reused
 * afterwards; parsers hold no per-call state.
 */
export class ParserRegistry {
  private readonly instances = new Map<ParserSourceId, JobParser>();
  private readonly sources: ReadonlySet<ParserSourceId>;

  constructor(private readonly factories: ParserFactories) {
    this.sources = new Set(PARSER_SOURCE_IDS.filter(source => factories[source] !== undefined));
  }

  has(source: string): source is ParserSourceId {
    return Array.from(this.sources).some(known => known === source);
  }

  get(source: string): JobParser | undefined {
    if (!this.has(source)) return undefined;

    let parser = this.instances.get(source);
    if (!parser) {
      const factory = this.factories[source];
      if (!factory) return undefined;
      parser = factory();
      this.instances.set(source, parser);
    }
    return parser;
  }

  listSources(): ReadonlySet<ParserSourceId> {
    return this.sources;
  }
}

/**
 * Registry of the parsers enabled in configuration
 */
export function createParserRegistry(
  config: Pick<Config, 'enabledSources' | 'lookbackDays'>
): ParserRegistry {
  const all: Record<ParserSourceId, () => JobParser> = {
    linkedin: () => new LinkedInParser(),
    indeed: () => new IndeedParser(),
    greenhouse: () => new GreenhouseParser(),
    wellfound: () => new WellfoundParser(),
    weworkremotely: () => new WeWorkRemotelyParser(config.lookbackDays),
  };

  const enabled: Partial<Record<ParserSourceId, () => JobParser>> = {};
  for (const source of config.enabledSources) {
    enabled[source] = all[source];
  }

  return new ParserRegistry(Object.freeze(enabled));
}
