import { httpGet, type HttpResponse, type HttpTransport } from '../../lib/http-client.js';
import { withRetry, sleep } from '../../lib/retry.js';
import { InvalidDomainError } from '../../lib/errors.js';
import { logger, type Logger } from '../../lib/logger.js';

export const BROWSER_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
};

const DOMAIN_PATTERN = /^(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/;

export interface FetchedPage {
  url: string;
  content: string;
}

export interface PageFetcherOptions {
  transport?: HttpTransport;
  timeoutMs?: number;
  maxAttempts?: number;
  retryDelayMinMs?: number;
  retryDelayMaxMs?: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

class RetryableFetchError extends Error {
  constructor(
    public readonly url: string,
    reason: string,
  ) {
    super(`${url}: ${reason}`);
    this.name = 'RetryableFetchError';
  }
}

/**
 * Lowercases and validates a bare domain. Anything carrying a scheme, path,
 * port or whitespace is rejected.
 */
export function normalizeDomain(input: string): string {
  const domain = input.trim().toLowerCase();
  if (!DOMAIN_PATTERN.test(domain)) {
    throw new InvalidDomainError(input);
  }
  return domain;
}

export function toggleWww(domain: string): string {
  return domain.startsWith('www.') ? domain.slice(4) : `www.${domain}`;
}

/**
 * Homepage URLs to try, in order: https before http, the domain as given
 * before its www-toggled variant.
 */
export function buildCandidateUrls(domain: string): string[] {
  const host = normalizeDomain(domain);
  const toggled = toggleWww(host);
  return [`https://${host}`, `http://${host}`, `https://${toggled}`, `http://${toggled}`];
}

export class PageFetcher {
  private transport: HttpTransport;
  private log: Logger;
  private settings: Required<Omit<PageFetcherOptions, 'transport'>>;

  constructor(options: PageFetcherOptions = {}) {
    this.transport = options.transport ?? httpGet;
    this.settings = {
      timeoutMs: options.timeoutMs ?? 10_000,
      maxAttempts: options.maxAttempts ?? 3,
      retryDelayMinMs: options.retryDelayMinMs ?? 1000,
      retryDelayMaxMs: options.retryDelayMaxMs ?? 3000,
      sleep: options.sleep ?? sleep,
      random: options.random ?? Math.random,
    };
    this.log = logger.child({ component: 'page-fetcher' });
  }

  /**
   * Fetch a single absolute URL. Resolves to the body on a 200, or null once
   * the URL is given up on. 403 and 404 are final on the first attempt.
   */
  async fetchUrl(url: string): Promise<string | null> {
    const { maxAttempts } = this.settings;

    try {
      return await withRetry(
        async (attempt) => {
          this.log.info({ url, attempt, maxAttempts }, 'Fetching page');

          let response: HttpResponse;
          try {
            response = await this.transport(url, {
              headers: BROWSER_HEADERS,
              timeout: this.settings.timeoutMs,
            });
          } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            this.log.warn({ url, attempt, error: reason }, 'Request failed');
            throw new RetryableFetchError(url, reason);
          }

          if (response.status === 200) return response.body;

          if (response.status === 403 || response.status === 404) {
            this.log.warn({ url, status: response.status }, 'Page refused or missing');
            return null;
          }

          this.log.warn({ url, attempt, status: response.status }, 'Unexpected status');
          throw new RetryableFetchError(url, `status ${response.status}`);
        },
        {
          maxAttempts,
          minDelayMs: this.settings.retryDelayMinMs,
          maxDelayMs: this.settings.retryDelayMaxMs,
          shouldRetry: error => error instanceof RetryableFetchError,
          sleep: this.settings.sleep,
          random: this.settings.random,
        },
      );
    } catch (error) {
      if (!(error instanceof RetryableFetchError)) throw error;
      this.log.warn({ url, maxAttempts }, 'Giving up on URL');
      return null;
    }
  }

  /**
   * Resolve a domain to the first URL variant that answers 200 with a
   * non-empty body. Null means the domain is unreachable.
   */
  async fetchHomepage(domain: string): Promise<FetchedPage | null> {
    const candidates = buildCandidateUrls(domain);

    for (const url of candidates) {
      const content = await this.fetchUrl(url);
      if (content) {
        this.log.info({ domain, url }, 'Homepage fetched');
        return { url, content };
      }
    }

    this.log.warn({ domain, tried: candidates.length }, 'Domain unreachable');
    return null;
  }
}
