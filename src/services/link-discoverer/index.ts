import * as cheerio from 'cheerio';

/** Words in an anchor's href or text that mark a policy, legal or contact page. */
export const LINK_KEYWORDS = [
  'privacy',
  'policy',
  'terms',
  'legal',
  'imprint',
  'impressum',
  'datenschutz',
  'contact',
  'kontakt',
  'about',
] as const;

/** Conventional locations of policy and legal pages, tried after discovered links. */
export const POLICY_PATHS = [
  '/privacy',
  '/privacy-policy',
  '/privacy-notice',
  '/terms',
  '/terms-of-service',
  '/terms-and-conditions',
  '/legal',
  '/imprint',
  '/impressum',
  '/datenschutz',
  '/data-protection',
  '/contact',
  '/about',
] as const;

/** Checked in this order; the first keyword with a matching href wins. */
export const CONTACT_KEYWORDS = ['contact', 'about-us', 'impressum', 'kontakt', 'imprint', 'about'] as const;

const IGNORED_HREF = /^(?:#|mailto:|tel:|javascript:|data:)/i;
const ABSOLUTE_HREF = /^https?:\/\//i;
const OTHER_SCHEME = /^[a-z][a-z0-9+.-]*:/i;

/**
 * Make an href absolute against the base URL. Root-relative hrefs replace the
 * base path, other relative hrefs are appended to it after a single slash.
 * Returns null for hrefs that do not point at a fetchable page.
 */
export function resolveUrl(baseUrl: string, href: string): string | null {
  const target = href.trim();
  if (!target || IGNORED_HREF.test(target)) return null;
  if (ABSOLUTE_HREF.test(target)) return stripFragment(target);
  if (target.startsWith('//')) {
    const scheme = /^(https?):/i.exec(baseUrl)?.[1]?.toLowerCase() ?? 'https';
    return stripFragment(`${scheme}:${target}`);
  }
  if (OTHER_SCHEME.test(target)) return null;

  const base = baseUrl.split('#')[0].split('?')[0];

  if (target.startsWith('/')) {
    const origin = /^https?:\/\/[^/]+/i.exec(base)?.[0] ?? base.replace(/\/+$/, '');
    return stripFragment(origin + target);
  }

  return stripFragment(`${base.replace(/\/+$/, '')}/${target}`);
}

function stripFragment(url: string): string {
  return url.split('#')[0];
}

function dedupeKey(url: string): string {
  return url.replace(/\/+$/, '').toLowerCase();
}

function collectAnchors(html: string): Array<{ href: string; text: string }> {
  const $ = cheerio.load(html);
  return $('a[href]')
    .toArray()
    .map(anchor => ({
      href: $(anchor).attr('href') ?? '',
      text: $(anchor).text(),
    }));
}

/**
 * Secondary pages worth searching for a company name: anchors whose href or
 * text carries a policy/contact keyword (document order), followed by the
 * conventional policy paths that were not already found.
 */
export function findCandidateUrls(baseUrl: string, homepageContent: string): string[] {
  const urls: string[] = [];
  const seen = new Set<string>();

  const add = (url: string | null) => {
    if (!url) return;
    const key = dedupeKey(url);
    if (seen.has(key)) return;
    seen.add(key);
    urls.push(url);
  };

  if (homepageContent) {
    for (const anchor of collectAnchors(homepageContent)) {
      const haystack = `${anchor.href} ${anchor.text}`.toLowerCase();
      if (LINK_KEYWORDS.some(keyword => haystack.includes(keyword))) {
        add(resolveUrl(baseUrl, anchor.href));
      }
    }
  }

  for (const path of POLICY_PATHS) {
    add(resolveUrl(baseUrl, path));
  }

  return urls;
}

export function findContactUrl(baseUrl: string, homepageContent: string): string | null {
  if (!baseUrl || !homepageContent) return null;

  const hrefs = collectAnchors(homepageContent).map(anchor => anchor.href);

  for (const keyword of CONTACT_KEYWORDS) {
    for (const href of hrefs) {
      if (!href.toLowerCase().includes(keyword)) continue;
      const url = resolveUrl(baseUrl, href);
      if (url) return url;
    }
  }

  return null;
}
