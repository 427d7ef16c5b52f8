import { config } from '../src/config/index.js';
import { DomainStore, type DomainRecord } from '../src/services/domain-store/index.js';
import { normalizeDomain } from '../src/services/page-fetcher/index.js';

// Usage: reset-store [file] [domain...]
const [fileArg, ...seedDomains] = process.argv.slice(2);
const filePath = fileArg ?? config.storeFile ?? 'domains-db.json';

const now = new Date().toISOString();
const seed: DomainRecord[] = seedDomains.map(domain => ({
  domain: normalizeDomain(domain),
  status: 'pending',
  company_name: null,
  contact_url: null,
  last_updated: now,
}));

const store = await DomainStore.open({ filePath });
await store.reset(seed);
await store.close();

console.log(`Reset ${filePath} with ${seed.length} domains`);
for (const record of store.list()) {
  console.log(`  - ${record.domain}`);
}
