import { describe, it, expect } from 'vitest';
import { normalizeCandidate, rankCandidates, selectCandidate } from './aggregator.js';
import type { Candidate } from './extractor.js';

function candidates(...values: string[]): Candidate[] {
  return values.map((value, order) => ({ value, position: order * 10, rule: 'test', order }));
}

describe('normalizeCandidate', () => {
  it.each([
    ['Acme Widgets Ltd.', 'acme widgets'],
    ['Beta Corp', 'beta'],
    ['Beta, Corp.', 'beta'],
    ['ACME Pty Ltd', 'acme'],
    ['Smith & Sons B.V.', 'smith sons'],
    ['  Initrode GmbH ;', 'initrode'],
    ['Globex Corporation', 'globex'],
  ])('%j -> %j', (value, expected) => {
    expect(normalizeCandidate(value)).toBe(expected);
  });
});

describe('rankCandidates', () => {
  it('counts spelling variants of one name together', () => {
    const ranked = rankCandidates(candidates('Gamma Inc', 'Beta Corp', 'BETA CORP.', 'Beta Corp'));

    expect(ranked.map(entry => [entry.normalized, entry.count])).toEqual([
      ['beta', 3],
      ['gamma', 1],
    ]);
    expect(ranked[0]?.candidate.value).toBe('Beta Corp');
  });

  it('drops implausible candidates before counting', () => {
    const ranked = rankCandidates(candidates('Privacy Policy', 'Privacy Policy', 'Acme Ltd'));
    expect(ranked.map(entry => entry.candidate.value)).toEqual(['Acme Ltd']);
  });
});

describe('selectCandidate', () => {
  it('breaks ties by first occurrence', () => {
    expect(selectCandidate(candidates('Alpha Ltd', 'Omega Ltd'))?.value).toBe('Alpha Ltd');
    expect(selectCandidate(candidates('Omega Ltd', 'Alpha Ltd'))?.value).toBe('Omega Ltd');
  });

  it('returns null when nothing survives', () => {
    expect(selectCandidate([])).toBeNull();
    expect(selectCandidate(candidates('About us'))).toBeNull();
  });
});
