export const BOILERPLATE_PHRASES = [
  'All Rights Reserved',
  'Privacy Policy',
  'Terms of Service',
  'Terms and Conditions',
  'Home',
  'About',
  'Contact',
  'Copyright',
  'Website',
] as const;

export const STOP_WORDS = ['us', 'policy', 'terms', 'conditions', 'cookies', 'sitemap', 'menu'] as const;

const SUSPICIOUS_PHRASES = [
  'all rights reserved',
  'privacy policy',
  'terms of service',
  'terms and conditions',
  'cookie policy',
  'sitemap',
  'contact us',
  'about us',
];

const MIN_NAME_LENGTH = 3;
/** Names at least this long may contain a navigation phrase and still be real. */
const PLAUSIBLE_LENGTH = 30;

const REMOVALS = [...BOILERPLATE_PHRASES, ...STOP_WORDS].map(
  phrase => new RegExp(`\\b${escapeRegExp(phrase).replace(/\s+/g, '\\s+')}\\b`, 'gi'),
);

const LEADING_JUNK = /^[\s.,;:|&\-–©]+/;
const TRAILING_JUNK = /[\s.,;:|&\-–]$/;
const DOTTED_SUFFIX_END = /(?:^|\s)(?:B\.V\.|S\.A\.)$/i;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function trimTrailing(value: string): string {
  let result = value;
  while (!DOTTED_SUFFIX_END.test(result) && TRAILING_JUNK.test(result)) {
    result = result.slice(0, -1);
  }
  return result;
}

function cleanOnce(value: string): string {
  let cleaned = value.replace(/<[^>]*>/g, ' ').replace(/\s+/g, ' ');
  for (const removal of REMOVALS) {
    cleaned = cleaned.replace(removal, ' ');
  }
  cleaned = cleaned.replace(/\s+/g, ' ').replace(LEADING_JUNK, '');
  return trimTrailing(cleaned).trim();
}

export function hasLetter(value: string): boolean {
  return /\p{L}/u.test(value);
}

/**
 * Strip markup, boilerplate and stray punctuation from a raw candidate.
 * Returns null when too little of a name is left.
 */
export function cleanCompanyName(raw: string): string | null {
  if (!raw) return null;

  let current = raw;
  for (;;) {
    const next = cleanOnce(current);
    if (next === current) break;
    current = next;
  }

  if (current.length < MIN_NAME_LENGTH || !hasLetter(current)) return null;
  return current;
}

/** Rejects short strings, strings without letters, and short navigation phrases. */
export function isPlausibleCompanyName(name: string): boolean {
  if (name.length < MIN_NAME_LENGTH || !hasLetter(name)) return false;

  const lower = name.toLowerCase();
  if (name.length < PLAUSIBLE_LENGTH && SUSPICIOUS_PHRASES.some(phrase => lower.includes(phrase))) {
    return false;
  }

  return true;
}
