import { describe, it, expect } from 'vitest';
import { directoryUrl, FetchLike, parseHtmlListing, parseJsonListing, WebAdapter } from './web-adapter.js';
import { ListRequest } from './adapter.js';
import { WebSettings } from '../types.js';
import { webSettings } from '../../test-utils/fixtures.js';

interface RecordedCall {
  url: string;
  method: string;
  headers: Record<string, string>;
}

function fakeFetch(...responses: Array<Response | Error>): { fetch: FetchLike; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetch: FetchLike = async (input, init) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    calls.push({ url: input, method: init?.method ?? 'GET', headers });
    const next = responses.shift();
    if (next === undefined) throw new Error('No response scripted');
    if (next instanceof Error) throw next;
    return next;
  };
  return { fetch, calls };
}

function request(overrides: Partial<ListRequest<WebSettings>> = {}): ListRequest<WebSettings> {
  return {
    settings: webSettings(),
    path: '/2026/02/23',
    namePattern: '*.csv',
    signal: new AbortController().signal,
    maxResults: 1000,
    ...overrides,
  };
}

const LISTING_URL = 'https://files.example.test/exports/2026/02/23/';

describe('WebAdapter', () => {
  it('should read JSON listings and keep matching files', async () => {
    const { fetch, calls } = fakeFetch(new Response(JSON.stringify([
      { name: 'a.csv', size: 10, lastModified: '2026-02-22T23:00:00Z', etag: '"v1"' },
      'b.csv',
      { Name: 'c.txt' },
    ]), { headers: { 'content-type': 'application/json' } }));
    const adapter = new WebAdapter(fetch);

    const files = await adapter.list(request({
      settings: webSettings({ authMode: 'bearer', secretHandle: 'web/token' }),
      secret: 'test-token',
    }));

    expect(calls[0]).toMatchObject({ url: LISTING_URL, method: 'GET' });
    expect(calls[0].headers.authorization).toBe('Bearer test-token');
    expect(files.map(file => file.locator)).toEqual([`${LISTING_URL}a.csv`, `${LISTING_URL}b.csv`]);
    expect(files[0]).toMatchObject({
      filename: 'a.csv',
      sizeBytes: 10,
      lastModified: '2026-02-22T23:00:00.000Z',
      metadata: { etag: '"v1"' },
    });
  });

  it('should read autoindex HTML listings', async () => {
    const html = `
      <a href="../">Parent</a>
      <a href="?C=N;O=D">Name</a>
      <a href="sub/">sub/</a>
      <a href="a.csv">a.csv</a>
      <a href="a.csv#top">a.csv</a>
      <a href="b%20c.csv">b c.csv</a>
      <a href="https://elsewhere.test/x.csv">x.csv</a>`;
    const { fetch } = fakeFetch(new Response(html, { headers: { 'content-type': 'text/html' } }));

    const files = await new WebAdapter(fetch).list(request());

    expect(files.map(file => file.filename)).toEqual(['a.csv', 'b c.csv']);
  });

  it('should probe a single file when the name has no wildcard', async () => {
    const { fetch, calls } = fakeFetch(new Response(null, {
      status: 200,
      headers: { 'content-length': '42', 'last-modified': 'Sun, 22 Feb 2026 23:00:00 GMT' },
    }));

    const files = await new WebAdapter(fetch).list(request({ namePattern: 'report', extension: 'csv' }));

    expect(calls.map(call => `${call.method} ${call.url}`)).toEqual([`HEAD ${LISTING_URL}report.csv`]);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatchObject({ filename: 'report.csv', sizeBytes: 42, lastModified: '2026-02-22T23:00:00.000Z' });
  });

  it('should keep a probed file whose name gained the configured extension', async () => {
    const { fetch, calls } = fakeFetch(new Response(null, { status: 200 }));

    const files = await new WebAdapter(fetch).list(request({
      settings: webSettings({ listingMode: 'probe' }),
      namePattern: 'Settlement-20260223',
      extension: '.CSV',
    }));

    expect(calls[0].url).toBe(`${LISTING_URL}Settlement-20260223.CSV`);
    expect(files.map(file => file.filename)).toEqual(['Settlement-20260223.CSV']);
  });

  it('should fall back to GET when HEAD is not allowed', async () => {
    const { fetch, calls } = fakeFetch(new Response(null, { status: 405 }), new Response('id,amount', { status: 200 }));

    const files = await new WebAdapter(fetch).list(request({ namePattern: 'report.csv' }));

    expect(calls.map(call => call.method)).toEqual(['HEAD', 'GET']);
    expect(files.map(file => file.filename)).toEqual(['report.csv']);
  });

  it.each([
    [401, 'AuthenticationFailed'],
    [404, 'NotFound'],
    [503, 'NetworkError'],
    [400, 'ProtocolError'],
  ])('should classify status %i as %s', async (status, category) => {
    const { fetch } = fakeFetch(new Response(null, { status }));

    await expect(new WebAdapter(fetch).list(request())).rejects.toMatchObject({ category });
  });

  it('should treat transport failures as network errors', async () => {
    const { fetch } = fakeFetch(new TypeError('fetch failed'));

    await expect(new WebAdapter(fetch).list(request())).rejects.toMatchObject({
      category: 'NetworkError',
      message: `Request to ${LISTING_URL} failed: fetch failed`,
    });
  });

  it('should reject listings it cannot parse', async () => {
    const { fetch } = fakeFetch(new Response('a.csv', { headers: { 'content-type': 'text/plain' } }));

    await expect(new WebAdapter(fetch).list(request())).rejects.toMatchObject({
      category: 'ProtocolError',
      message: 'Unsupported listing content type "text/plain"',
    });
  });

  it('should accept 405 from a connection test', async () => {
    const { fetch, calls } = fakeFetch(new Response(null, { status: 405 }));

    await new WebAdapter(fetch).testConnection(webSettings(), undefined, new AbortController().signal);

    expect(calls[0]).toMatchObject({ url: 'https://files.example.test/exports', method: 'HEAD' });
  });
});

describe('listing helpers', () => {
  it('should build directory URLs from resolved paths', () => {
    expect(directoryUrl('https://files.example.test/exports', '/2026/02 23/')).toBe(
      'https://files.example.test/exports/2026/02%2023/'
    );
    expect(directoryUrl('https://files.example.test/exports/', '')).toBe('https://files.example.test/exports/');
  });

  it('should accept wrapped JSON listings', () => {
    expect(parseJsonListing({ files: [{ url: '/exports/a.csv' }] }, LISTING_URL)).toEqual([
      {
        name: 'a.csv',
        url: 'https://files.example.test/exports/a.csv',
        sizeBytes: null,
        lastModified: null,
        metadata: {},
      },
    ]);
    expect(() => parseJsonListing({ items: [] }, LISTING_URL)).toThrow('JSON listing is not an array of files');
  });

  it('should return no entries for a page without links', () => {
    expect(parseHtmlListing('<p>Empty</p>', LISTING_URL)).toEqual([]);
  });
});
