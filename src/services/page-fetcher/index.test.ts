import { describe, it, expect, vi } from 'vitest';
import { PageFetcher, buildCandidateUrls, normalizeDomain, BROWSER_HEADERS } from './index.js';
import { InvalidDomainError, ValidationError } from '../../lib/errors.js';
import type { HttpTransport } from '../../lib/http-client.js';
import { createFakeTransport, page } from '../../test-utils/fake-transport.js';

function createFetcher(routes: Parameters<typeof createFakeTransport>[0], fallback?: Parameters<typeof createFakeTransport>[1]) {
  const fake = createFakeTransport(routes, fallback);
  const sleep = vi.fn(async (_ms: number) => {});
  const fetcher = new PageFetcher({
    transport: fake.transport,
    sleep,
    random: () => 0.5,
    retryDelayMinMs: 1000,
    retryDelayMaxMs: 3000,
  });
  return { fetcher, sleep, calls: fake.calls };
}

describe('buildCandidateUrls', () => {
  it('tries https then http, bare domain before the www variant', () => {
    expect(buildCandidateUrls('example.com')).toEqual([
      'https://example.com',
      'http://example.com',
      'https://www.example.com',
      'http://www.example.com',
    ]);
  });

  it('strips www. for the toggled variant', () => {
    expect(buildCandidateUrls('www.example.org')).toEqual([
      'https://www.example.org',
      'http://www.example.org',
      'https://example.org',
      'http://example.org',
    ]);
  });

  it('normalizes case and surrounding whitespace', () => {
    expect(buildCandidateUrls(' Example.COM ')[0]).toBe('https://example.com');
  });
});

describe('normalizeDomain', () => {
  it.each(['https://example.com', 'example.com/about', '', 'localhost', 'exa mple.com', 'example.com:8080'])(
    'rejects %j',
    (input) => {
      expect(() => normalizeDomain(input)).toThrow(ValidationError);
    },
  );

  it('names the rejected input', () => {
    expect(() => normalizeDomain('https://acme.test')).toThrow(InvalidDomainError);
    expect(() => normalizeDomain('https://acme.test')).toThrow("Invalid domain: 'https://acme.test'");
  });

  it('accepts multi-label domains', () => {
    expect(normalizeDomain('shop.example.co.uk')).toBe('shop.example.co.uk');
  });
});

describe('PageFetcher.fetchUrl', () => {
  it('returns the body of a 200 response', async () => {
    const { fetcher, calls } = createFetcher({ 'https://example.com/privacy': page('<p>policy</p>') });

    await expect(fetcher.fetchUrl('https://example.com/privacy')).resolves.toBe('<p>policy</p>');
    expect(calls).toEqual(['https://example.com/privacy']);
  });

  it('sends browser headers and the configured timeout', async () => {
    const transport = vi.fn<HttpTransport>(async () => ({ status: 200, body: 'ok' }));
    const fetcher = new PageFetcher({ transport, timeoutMs: 4000 });

    await fetcher.fetchUrl('https://example.com');

    expect(transport).toHaveBeenCalledWith('https://example.com', { headers: BROWSER_HEADERS, timeout: 4000 });
    expect(BROWSER_HEADERS['User-Agent']).toMatch(/^Mozilla\/5\.0/);
  });

  it.each([403, 404])('does not retry a %i', async (status) => {
    const { fetcher, calls, sleep } = createFetcher({ 'https://example.com': { status } });

    await expect(fetcher.fetchUrl('https://example.com')).resolves.toBeNull();
    expect(calls).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries other statuses with a random delay between attempts', async () => {
    const { fetcher, calls, sleep } = createFetcher({
      'https://example.com': [{ status: 500 }, { status: 503 }, page('third time lucky')],
    });

    await expect(fetcher.fetchUrl('https://example.com')).resolves.toBe('third time lucky');
    expect(calls).toHaveLength(3);
    expect(sleep.mock.calls).toEqual([[2000], [2000]]);
  });

  it('gives up after the last attempt on transport errors', async () => {
    const { fetcher, calls, sleep } = createFetcher({ 'https://example.com': new Error('socket hang up') });

    await expect(fetcher.fetchUrl('https://example.com')).resolves.toBeNull();
    expect(calls).toHaveLength(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });
});

describe('PageFetcher.fetchHomepage', () => {
  it('falls back to the www-stripped variant', async () => {
    const { fetcher, calls } = createFetcher({ 'https://example.org': page('<html>home</html>') });

    await expect(fetcher.fetchHomepage('www.example.org')).resolves.toEqual({
      url: 'https://example.org',
      content: '<html>home</html>',
    });
    expect(calls).toEqual([
      'https://www.example.org',
      'https://www.example.org',
      'https://www.example.org',
      'http://www.example.org',
      'http://www.example.org',
      'http://www.example.org',
      'https://example.org',
    ]);
  });

  it('moves on to the next variant after a 404', async () => {
    const { fetcher, calls } = createFetcher({
      'https://example.com': { status: 404 },
      'http://example.com': page('plain http'),
    });

    const result = await fetcher.fetchHomepage('example.com');

    expect(result?.url).toBe('http://example.com');
    expect(calls).toEqual(['https://example.com', 'http://example.com']);
  });

  it('skips a variant that answers with an empty body', async () => {
    const { fetcher } = createFetcher({
      'https://example.com': page(''),
      'http://example.com': page('content'),
    });

    expect((await fetcher.fetchHomepage('example.com'))?.url).toBe('http://example.com');
  });

  it('returns null when every variant fails', async () => {
    const { fetcher, calls } = createFetcher({}, { status: 404 });

    await expect(fetcher.fetchHomepage('example.com')).resolves.toBeNull();
    expect(calls).toHaveLength(4);
  });

  it('throws on a malformed domain', async () => {
    const { fetcher } = createFetcher({});
    await expect(fetcher.fetchHomepage('https://example.com')).rejects.toBeInstanceOf(ValidationError);
  });
});
