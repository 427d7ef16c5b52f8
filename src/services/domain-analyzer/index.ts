import { config } from '../../config/index.js';
import { logger, type Logger } from '../../lib/logger.js';
import { ValidationError } from '../../lib/errors.js';
import { randomBetween, sleep } from '../../lib/retry.js';
import { PageFetcher, normalizeDomain } from '../page-fetcher/index.js';
import { toText } from '../text-normalizer/index.js';
import { findCandidateUrls, findContactUrl } from '../link-discoverer/index.js';
import { NameExtractor, type PatternRule, type RuleSetName } from '../name-extractor/index.js';
import type { AnalysisResult } from './types.js';

export * from './types.js';

export interface DomainAnalyzerOptions {
  fetcher?: PageFetcher;
  ruleSet?: RuleSetName | readonly PatternRule[];
  /** Follow policy, legal and contact pages when the homepage has no name. */
  searchPolicyPages?: boolean;
  detectContactUrl?: boolean;
  maxSecondaryPages?: number;
  batchDelayMinMs?: number;
  batchDelayMaxMs?: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export class DomainAnalyzer {
  private fetcher: PageFetcher;
  private extractor: NameExtractor;
  private log: Logger;
  private options: {
    searchPolicyPages: boolean;
    detectContactUrl: boolean;
    maxSecondaryPages: number;
    batchDelayMinMs: number;
    batchDelayMaxMs: number;
    sleep: (ms: number) => Promise<void>;
    random: () => number;
  };

  constructor(options: DomainAnalyzerOptions = {}) {
    this.fetcher = options.fetcher ?? new PageFetcher();
    this.extractor = new NameExtractor(options.ruleSet ?? 'full');
    this.options = {
      searchPolicyPages: options.searchPolicyPages ?? true,
      detectContactUrl: options.detectContactUrl ?? true,
      maxSecondaryPages: options.maxSecondaryPages ?? Infinity,
      batchDelayMinMs: options.batchDelayMinMs ?? 1000,
      batchDelayMaxMs: options.batchDelayMaxMs ?? 3000,
      sleep: options.sleep ?? sleep,
      random: options.random ?? Math.random,
    };
    this.log = logger.child({ component: 'domain-analyzer' });
  }

  /**
   * Homepage first, then each discovered policy or contact page until one
   * yields a name. Only a malformed domain throws; network and parse faults
   * end up in the result status.
   */
  async analyzeDomain(input: string): Promise<AnalysisResult> {
    const domain = normalizeDomain(input);
    this.log.info({ domain }, 'Analyzing domain');

    const homepage = await this.fetcher.fetchHomepage(domain);
    if (!homepage) {
      return { domain, status: 'error', companyName: null, contactUrl: null };
    }

    const contactUrl = this.options.detectContactUrl
      ? this.safely(() => findContactUrl(homepage.url, homepage.content), null, 'Contact link lookup failed')
      : null;

    let companyName = this.extractFromPage(homepage.content, homepage.url);

    if (!companyName && this.options.searchPolicyPages) {
      companyName = await this.searchSecondaryPages(homepage.url, homepage.content);
    }

    if (!companyName) {
      this.log.info({ domain }, 'No company name found');
    }

    return { domain, status: 'analyzed', companyName, contactUrl };
  }

  /**
   * Analyze domains one after another with a random pause between them.
   * A domain that fails unexpectedly is reported as an error and the batch
   * carries on, as it does when `onResult` throws for one domain.
   */
  async analyzeDomains(
    domains: readonly string[],
    onResult?: (result: AnalysisResult, index: number) => void | Promise<void>,
  ): Promise<AnalysisResult[]> {
    const results: AnalysisResult[] = [];

    for (const [index, domain] of domains.entries()) {
      let result: AnalysisResult;
      try {
        result = await this.analyzeDomain(domain);
      } catch (error) {
        this.log.error({ error: String(error), domain }, 'Analysis failed for domain');
        result = { domain, status: 'error', companyName: null, contactUrl: null };
      }

      results.push(result);
      if (onResult) {
        try {
          await onResult(result, index);
        } catch (error) {
          this.log.error({ error: String(error), domain }, 'Result handler failed for domain');
        }
      }

      if (index < domains.length - 1) {
        const delay = randomBetween(this.options.batchDelayMinMs, this.options.batchDelayMaxMs, this.options.random);
        this.log.debug({ delayMs: Math.round(delay) }, 'Waiting before next domain');
        await this.options.sleep(delay);
      }
    }

    return results;
  }

  private async searchSecondaryPages(baseUrl: string, homepageContent: string): Promise<string | null> {
    const urls = this.safely(() => findCandidateUrls(baseUrl, homepageContent), [], 'Link discovery failed');
    const limit = Math.min(urls.length, this.options.maxSecondaryPages);

    for (const url of urls.slice(0, limit)) {
      this.log.info({ url }, 'Checking secondary page');
      const content = await this.fetcher.fetchUrl(url);
      if (!content) continue;

      const name = this.extractFromPage(content, url);
      if (name) return name;
    }

    return null;
  }

  /** Raw markup first for structure-aware rules, then the page's plain text. */
  private extractFromPage(content: string, url: string): string | null {
    return this.safely(
      () =>
        this.extractor.extractCompanyName(content, 'markup') ??
        this.extractor.extractCompanyName(toText(content), 'text'),
      null,
      'Extraction failed',
      { url },
    );
  }

  private safely<T>(fn: () => T, fallback: T, message: string, context: Record<string, unknown> = {}): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof ValidationError) throw error;
      this.log.error({ ...context, error: String(error) }, message);
      return fallback;
    }
  }
}

/** Analyzer wired with the fetch, retry and batch settings from the environment. */
export function createConfiguredAnalyzer(overrides: DomainAnalyzerOptions = {}): DomainAnalyzer {
  const fetcher = new PageFetcher({
    timeoutMs: config.fetch.timeoutMs,
    maxAttempts: config.fetch.maxAttempts,
    retryDelayMinMs: config.fetch.retryDelayMinMs,
    retryDelayMaxMs: config.fetch.retryDelayMaxMs,
  });

  return new DomainAnalyzer({
    fetcher,
    ruleSet: config.ruleSet,
    batchDelayMinMs: config.batch.delayMinMs,
    batchDelayMaxMs: config.batch.delayMaxMs,
    ...overrides,
  });
}
