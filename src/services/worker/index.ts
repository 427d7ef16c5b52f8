import { logger } from '../../lib/logger.js';
import type { DomainAnalyzer } from '../domain-analyzer/index.js';
import type { DomainStore } from '../domain-store/index.js';

export interface DomainWorkerOptions {
  intervalMs: number;
  /** Re-analyze every stored domain rather than only pending ones. */
  includeAnalyzed?: boolean;
}

export interface WorkerRunSummary {
  processed: number;
  found: number;
  errors: number;
}

const log = logger.child({ component: 'worker' });

export class DomainWorker {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<WorkerRunSummary> | null = null;
  private stopped = true;

  constructor(
    private store: DomainStore,
    private analyzer: DomainAnalyzer,
    private options: DomainWorkerOptions,
  ) {}

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    log.info({ intervalMs: this.options.intervalMs, includeAnalyzed: !!this.options.includeAnalyzed }, 'Worker started');
    this.schedule(0);
  }

  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.running) {
      await this.running.catch((error: unknown) => {
        log.warn({ error: String(error) }, 'Worker pass failed during shutdown');
      });
    }
    log.info('Worker stopped');
  }

  /** One pass over the store. Concurrent calls share the pass in progress. */
  runOnce(): Promise<WorkerRunSummary> {
    if (!this.running) {
      this.running = this.process().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runOnce()
        .catch((error: unknown) => {
          log.error({ error: String(error) }, 'Worker pass failed');
        })
        .finally(() => {
          if (!this.stopped) this.schedule(this.options.intervalMs);
        });
    }, delayMs);
  }

  private async process(): Promise<WorkerRunSummary> {
    const records = this.options.includeAnalyzed ? this.store.list() : this.store.listByStatus('pending');
    const domains = records.map(record => record.domain);

    if (domains.length === 0) {
      log.debug('No domains to process');
      return { processed: 0, found: 0, errors: 0 };
    }

    log.info({ domains: domains.length }, 'Processing domains');
    const summary: WorkerRunSummary = { processed: 0, found: 0, errors: 0 };

    await this.analyzer.analyzeDomains(domains, async (result, index) => {
      // A domain deleted while the pass was running stays deleted
      await this.store.update(domains[index], {
        status: result.status,
        company_name: result.companyName,
        contact_url: result.contactUrl,
      });
      summary.processed++;
      if (result.companyName) summary.found++;
      if (result.status === 'error') summary.errors++;
    });

    log.info(summary, 'Worker pass complete');
    return summary;
  }
}
