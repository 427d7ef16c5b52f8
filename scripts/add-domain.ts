import ky, { HTTPError } from 'ky';

// Usage: add-domain <domain> [apiUrl]
const domain = process.argv[2] ?? 'example.com';
const apiUrl = process.argv[3] ?? process.env.API_URL ?? 'http://localhost:3000';

try {
  const response = await ky.post(`${apiUrl}/api/domains`, { json: { domain } }).json<{ message: string }>();
  console.log(response.message);
} catch (error) {
  if (error instanceof HTTPError) {
    console.error(`Error: ${error.response.status} - ${await error.response.text()}`);
  } else {
    console.error(`Error: ${String(error)}`);
  }
  process.exit(1);
}
