import ky, { HTTPError } from 'ky';
import type { SerializedAnalysisResult } from '../src/services/domain-analyzer/types.js';

// Usage: analyze-domain <domain> [apiUrl]
const domain = process.argv[2] ?? 'example.com';
const apiUrl = process.argv[3] ?? process.env.API_URL ?? 'http://localhost:3000';

console.log(`Analyzing domain: ${domain}`);

try {
  const result = await ky
    .get(`${apiUrl}/api/analyze/${encodeURIComponent(domain)}`, { timeout: 120_000 })
    .json<SerializedAnalysisResult>();
  console.log(`Domain: ${result.domain}`);
  console.log(`Status: ${result.status}`);
  console.log(`Company name: ${result.company_name ?? '-'}`);
  console.log(`Contact URL: ${result.contact_url ?? '-'}`);
} catch (error) {
  if (error instanceof HTTPError) {
    console.error(`Error: ${error.response.status} - ${await error.response.text()}`);
  } else {
    console.error(`Error: ${String(error)}`);
  }
  process.exit(1);
}
