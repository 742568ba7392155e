/**
 * Extractor Registry
 *
 * Ordered list of extractors, consulted by section kind. Registration order
 * is the order tasks are scheduled in; it never affects the candidate pool.
 */

import { ProfilerErrorFactory } from '../errors/types';
import type { SectionKind } from '../types';
import { ContactHeuristicExtractor } from './contactHeuristic';
import { ContactPatternExtractor } from './contactPattern';
import { DateRangeExtractor } from './dateRange';
import { OrganizationTitleExtractor } from './organizationTitle';
import { SkillTermExtractor } from './skillTerm';
import type { Extractor, ExtractorOptions } from './types';

export class ExtractorRegistry {
  private readonly extractors: Extractor[] = [];

  /**
   * @throws ProfilerError with code CONFIGURATION_ERROR on a duplicate id
   */
  register(extractor: Extractor): this {
    if (this.extractors.some(existing => existing.id === extractor.id)) {
      throw ProfilerErrorFactory.configurationError('extractors', `duplicate extractor id "${extractor.id}"`);
    }
    this.extractors.push(extractor);
    return this;
  }

  unregister(id: string): boolean {
    const index = this.extractors.findIndex(extractor => extractor.id === id);
    if (index === -1) {
      return false;
    }
    this.extractors.splice(index, 1);
    return true;
  }

  get(id: string): Extractor | undefined {
    return this.extractors.find(extractor => extractor.id === id);
  }

  forKind(kind: SectionKind): Extractor[] {
    return this.extractors.filter(extractor => extractor.kinds.includes(kind));
  }

  list(): readonly Extractor[] {
    return [...this.extractors];
  }
}

export function createDefaultRegistry(options: ExtractorOptions): ExtractorRegistry {
  return new ExtractorRegistry()
    .register(new ContactPatternExtractor())
    .register(new ContactHeuristicExtractor())
    .register(new DateRangeExtractor())
    .register(new OrganizationTitleExtractor(options))
    .register(new SkillTermExtractor());
}
