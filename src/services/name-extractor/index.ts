import { logger, type Logger } from '../../lib/logger.js';
import { RULE_SETS, type ContentKind, type PatternRule, type RuleSetName } from './patterns.js';
import { extractCandidates } from './extractor.js';
import { rankCandidates } from './aggregator.js';
import { cleanCompanyName, isPlausibleCompanyName } from './cleaner.js';

export * from './patterns.js';
export * from './extractor.js';
export * from './aggregator.js';
export * from './cleaner.js';

export class NameExtractor {
  readonly rules: readonly PatternRule[];
  private log: Logger;

  constructor(rules: RuleSetName | readonly PatternRule[] = 'full') {
    this.rules = typeof rules === 'string' ? RULE_SETS[rules] : rules;
    this.log = logger.child({ component: 'name-extractor' });
  }

  /**
   * Most frequently mentioned company name in the content, cleaned. Falls
   * through to the next-ranked name when the best one cleans away to nothing.
   */
  extractCompanyName(content: string, kind: ContentKind): string | null {
    const candidates = extractCandidates(content, this.rules, kind);
    if (candidates.length === 0) return null;

    for (const ranked of rankCandidates(candidates)) {
      const name = cleanCompanyName(ranked.candidate.value);
      if (name && isPlausibleCompanyName(name)) {
        this.log.info(
          { name, rule: ranked.candidate.rule, mentions: ranked.count, candidates: candidates.length },
          'Extracted company name',
        );
        return name;
      }
    }

    this.log.debug({ candidates: candidates.length, kind }, 'No usable company name among candidates');
    return null;
  }
}
