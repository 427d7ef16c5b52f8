import { readFile, rename, writeFile } from 'fs/promises';
import { z } from 'zod';
import { logger, type Logger } from '../../lib/logger.js';
import {
  DOMAIN_STATUSES,
  serializeResult,
  type AnalysisResult,
  type DomainStatus,
  type SerializedAnalysisResult,
} from '../domain-analyzer/types.js';

export interface DomainRecord extends SerializedAnalysisResult {
  last_updated: string;
}

/** Undefined leaves a field as it is; null clears it. */
export interface DomainUpdate {
  status?: DomainStatus;
  company_name?: string | null;
  contact_url?: string | null;
}

export interface DomainStoreOptions {
  /** JSON file to persist to. Without one the store lives in memory only. */
  filePath?: string;
  seed?: readonly DomainRecord[];
  now?: () => Date;
}

export const domainRecordSchema = z.object({
  domain: z.string().min(1),
  status: z.enum(DOMAIN_STATUSES),
  company_name: z.string().nullable().default(null),
  contact_url: z.string().nullable().default(null),
  last_updated: z.string(),
});

const storeFileSchema = z.array(domainRecordSchema);

/**
 * Domain records keyed by domain string. Created once at start-up and passed
 * to whoever needs it; `close()` waits for pending file writes.
 */
export class DomainStore {
  private records = new Map<string, DomainRecord>();
  private pendingWrite: Promise<void> = Promise.resolve();
  private log: Logger;
  private now: () => Date;

  private constructor(private readonly filePath: string | undefined, now: () => Date) {
    this.now = now;
    this.log = logger.child({ component: 'domain-store', backend: filePath ? 'file' : 'memory' });
  }

  static async open(options: DomainStoreOptions = {}): Promise<DomainStore> {
    const store = new DomainStore(options.filePath, options.now ?? (() => new Date()));

    const persisted = options.filePath ? await store.load(options.filePath) : null;
    const initial = persisted ?? options.seed ?? [];
    for (const record of initial) {
      store.records.set(record.domain, { ...record });
    }

    if (options.filePath && !persisted) {
      await store.persist();
    }

    store.log.info({ domains: store.records.size }, 'Domain store opened');
    return store;
  }

  get size(): number {
    return this.records.size;
  }

  list(): DomainRecord[] {
    return [...this.records.values()].map(record => ({ ...record }));
  }

  listByStatus(status: DomainStatus): DomainRecord[] {
    return this.list().filter(record => record.status === status);
  }

  get(domain: string): DomainRecord | null {
    const record = this.records.get(domain);
    return record ? { ...record } : null;
  }

  /** False when the domain is already stored. */
  async add(domain: string): Promise<boolean> {
    if (this.records.has(domain)) return false;

    this.records.set(domain, {
      domain,
      status: 'pending',
      company_name: null,
      contact_url: null,
      last_updated: this.timestamp(),
    });
    this.log.info({ domain }, 'Domain added');
    await this.persist();
    return true;
  }

  /** False when the domain is not stored. */
  async update(domain: string, patch: DomainUpdate): Promise<boolean> {
    const record = this.records.get(domain);
    if (!record) return false;

    const updated: DomainRecord = { ...record, last_updated: this.timestamp() };
    if (patch.status !== undefined) updated.status = patch.status;
    if (patch.company_name !== undefined) updated.company_name = patch.company_name;
    if (patch.contact_url !== undefined) updated.contact_url = patch.contact_url;

    this.records.set(domain, updated);
    this.log.info({ domain, ...patch }, 'Domain updated');
    await this.persist();
    return true;
  }

  /** Store an analysis result, replacing every field of an existing record. */
  async upsertResult(result: AnalysisResult): Promise<DomainRecord> {
    const record: DomainRecord = { ...serializeResult(result), last_updated: this.timestamp() };
    this.records.set(record.domain, record);
    await this.persist();
    return { ...record };
  }

  async delete(domain: string): Promise<boolean> {
    if (!this.records.delete(domain)) return false;
    this.log.info({ domain }, 'Domain deleted');
    await this.persist();
    return true;
  }

  async reset(records: readonly DomainRecord[] = []): Promise<void> {
    this.records = new Map(records.map(record => [record.domain, { ...record }]));
    this.log.info({ domains: this.records.size }, 'Domain store reset');
    await this.persist();
  }

  async close(): Promise<void> {
    await this.pendingWrite;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private async load(filePath: string): Promise<DomainRecord[] | null> {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    try {
      return storeFileSchema.parse(JSON.parse(raw));
    } catch (error) {
      this.log.error({ filePath, error: String(error) }, 'Store file unreadable, starting empty');
      return null;
    }
  }

  /** Writes are chained so the file always reflects the latest state. */
  private persist(): Promise<void> {
    const filePath = this.filePath;
    if (!filePath) return Promise.resolve();

    const snapshot = JSON.stringify(this.list(), null, 2);
    const tempPath = `${filePath}.tmp`;

    const write = async () => {
      await writeFile(tempPath, snapshot, 'utf-8');
      await rename(tempPath, filePath);
    };

    // A failed write is reported to its caller and does not block later ones
    this.pendingWrite = this.pendingWrite.then(write, write);

    return this.pendingWrite;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
