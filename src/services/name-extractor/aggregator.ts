import { isPlausibleCompanyName } from './cleaner.js';
import type { Candidate } from './extractor.js';

const COMPARABLE_SUFFIX = /[\s,]+(?:pty\s+ltd|ltd|limited|llc|inc|corporation|corp|gmbh|b\.v\.?|s\.a\.?|co\.)\.?$/;

export interface RankedCandidate {
  normalized: string;
  count: number;
  /** First raw occurrence of this normalized form. */
  candidate: Candidate;
}

/** Comparison key: lowercase, no trailing legal suffix, no punctuation. */
export function normalizeCandidate(value: string): string {
  return value
    .toLowerCase()
    .trim()
    .replace(/[\s,;:]+$/, '')
    .replace(COMPARABLE_SUFFIX, '')
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Tally plausible candidates by normalized form, most frequent first.
 * Equal counts keep the order in which each form was first seen.
 */
export function rankCandidates(candidates: readonly Candidate[]): RankedCandidate[] {
  const tallies = new Map<string, RankedCandidate>();

  for (const candidate of candidates) {
    if (!isPlausibleCompanyName(candidate.value)) continue;

    const normalized = normalizeCandidate(candidate.value);
    if (!normalized) continue;

    const tally = tallies.get(normalized);
    if (tally) {
      tally.count++;
    } else {
      tallies.set(normalized, { normalized, count: 1, candidate });
    }
  }

  // sort is stable, so ties stay in first-seen order
  return [...tallies.values()].sort((a, b) => b.count - a.count);
}

export function selectCandidate(candidates: readonly Candidate[]): Candidate | null {
  return rankCandidates(candidates)[0]?.candidate ?? null;
}
