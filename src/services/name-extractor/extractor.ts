import { appliesTo, type ContentKind, type PatternRule } from './patterns.js';

export interface RuleMatch {
  value: string;
  position: number;
}

export interface Candidate extends RuleMatch {
  rule: string;
  /** Index in scan order across every rule of one extraction call. */
  order: number;
}

/** All captures of a single rule against the content, in position order. */
export function applyRule(rule: PatternRule, content: string): RuleMatch[] {
  const matches: RuleMatch[] = [];
  for (const match of content.matchAll(rule.pattern)) {
    // a bare capture can run into the comma that separates it from the anchor text
    const value = match[1]?.replace(/^[\s,]+|[\s,]+$/g, '');
    if (value) matches.push({ value, position: match.index ?? 0 });
  }
  return matches;
}

/**
 * Run every applicable rule over the content. Candidates come out rule by
 * rule in rule-set order, and by position within a rule.
 */
export function extractCandidates(
  content: string,
  rules: readonly PatternRule[],
  kind: ContentKind = 'text',
): Candidate[] {
  const candidates: Candidate[] = [];
  if (!content) return candidates;

  for (const rule of rules) {
    if (!appliesTo(rule, kind)) continue;
    for (const match of applyRule(rule, content)) {
      candidates.push({ ...match, rule: rule.name, order: candidates.length });
    }
  }

  return candidates;
}
