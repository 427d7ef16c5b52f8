import { readFile, writeFile } from 'fs/promises';
import { parseArgs } from 'util';
import { createConfiguredAnalyzer, serializeResult, type AnalysisResult } from '../src/services/domain-analyzer/index.js';
import { isRuleSetName } from '../src/services/name-extractor/index.js';

const usage = 'Usage: extract-companies (--domains <domain...> | --file <path>) [--output <file.json>] [--rule-set full|footer|policy]';

const { values, positionals } = parseArgs({
  options: {
    domains: { type: 'string', short: 'd', multiple: true },
    file: { type: 'string', short: 'f' },
    output: { type: 'string', short: 'o' },
    'rule-set': { type: 'string' },
  },
  allowPositionals: true,
});

async function readDomains(): Promise<string[]> {
  if (values.file) {
    const raw = await readFile(values.file, 'utf-8');
    return raw.split('\n').map(line => line.trim()).filter(Boolean);
  }
  // `-d a.com b.com` leaves everything after the first domain as positionals
  return [...(values.domains ?? []), ...positionals];
}

function percent(count: number, total: number): string {
  return `${((count / total) * 100).toFixed(1)}%`;
}

const ruleSet = values['rule-set'] ?? 'full';
if (!isRuleSetName(ruleSet)) {
  console.error(`Unknown rule set '${ruleSet}'\n${usage}`);
  process.exit(1);
}

if (values.domains && values.file) {
  console.error(`Pass either --domains or --file, not both\n${usage}`);
  process.exit(1);
}

let domains: string[];
try {
  domains = await readDomains();
} catch (error) {
  console.error(`Error reading domains file: ${String(error)}`);
  process.exit(1);
}

if (domains.length === 0) {
  console.error(usage);
  process.exit(1);
}

const analyzer = createConfiguredAnalyzer({ ruleSet });
const output = values.output;
const report: AnalysisResult[] = [];

console.log(`Processing ${domains.length} domains...`);

await analyzer.analyzeDomains(domains, async (result, index) => {
  report.push(result);
  console.log(`[${index + 1}/${domains.length}] ${result.domain}`);
  console.log(`  Status: ${result.status}`);
  console.log(`  Company name: ${result.companyName ?? '-'}`);
  if (result.contactUrl) console.log(`  Contact URL: ${result.contactUrl}`);

  if (output) {
    await writeFile(output, JSON.stringify(report.map(serializeResult), null, 2), 'utf-8');
  }
});

if (output) console.log(`Results saved to ${output}`);

const found = report.filter(r => r.status === 'analyzed' && r.companyName).length;
const notFound = report.filter(r => r.status === 'analyzed' && !r.companyName).length;
const errors = report.filter(r => r.status === 'error').length;

console.log('\nExtraction summary:');
console.log(`Total domains: ${domains.length}`);
console.log(`Company name found: ${found} (${percent(found, domains.length)})`);
console.log(`Company name not found: ${notFound} (${percent(notFound, domains.length)})`);
console.log(`Errors: ${errors} (${percent(errors, domains.length)})`);
