import { JSDOM } from 'jsdom';
import { logger } from '../../logger.js';
import { errorMessage, RetrievalError } from '../errors.js';
import { DiscoveredFile, WebSettings } from '../types.js';
import {
  hasGlob,
  limitResults,
  ListRequest,
  matchesName,
  parseDate,
  ProtocolAdapter,
  throwIfCancelled,
} from './adapter.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

interface ListingEntry {
  name: string;
  url: string;
  sizeBytes: number | null;
  lastModified: string | null;
  metadata: Record<string, string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function lastSegment(url: string): string {
  const pathname = new URL(url).pathname;
  const segment = pathname.split('/').filter((part) => part.length > 0).pop() ?? '';
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

export function directoryUrl(baseUrl: string, path: string): string {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  const relative = path
    .split('/')
    .filter((segment) => segment.length > 0)
    .map((segment) => encodeURIComponent(segment))
    .join('/');
  return relative.length > 0 ? `${base}${relative}/` : base;
}

function authorizationHeaders(settings: WebSettings, secret: string | undefined): Record<string, string> {
  switch (settings.authMode) {
    case 'none':
      return {};
    case 'basic': {
      const token = Buffer.from(`${settings.username ?? ''}:${secret ?? ''}`).toString('base64');
      return { Authorization: `Basic ${token}` };
    }
    case 'bearer':
      return { Authorization: `Bearer ${secret ?? ''}` };
    case 'api-key':
      return { [settings.apiKeyHeader ?? 'X-API-Key']: secret ?? '' };
  }
}

function statusError(response: Response, url: string): RetrievalError {
  const context = { status: response.status, url };
  const message = `HTTP ${response.status} ${response.statusText}`.trim();
  if (response.status === 401 || response.status === 403) {
    return new RetrievalError(`Request rejected: ${message}`, 'AuthenticationFailed', context);
  }
  if (response.status === 404 || response.status === 410) {
    return new RetrievalError(`Remote path not found: ${message}`, 'NotFound', context);
  }
  if (response.status === 408 || response.status === 429 || response.status >= 500) {
    return new RetrievalError(`Server unavailable: ${message}`, 'NetworkError', context);
  }
  return new RetrievalError(`Unexpected response: ${message}`, 'ProtocolError', context);
}

function numberOrNull(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value) && value >= 0) return value;
  if (typeof value === 'string' && /^\d+$/.test(value)) return Number(value);
  return null;
}

function field(entry: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    const match = Object.keys(entry).find((candidate) => candidate.toLowerCase() === key.toLowerCase());
    if (match !== undefined && entry[match] !== undefined && entry[match] !== null) {
      return entry[match];
    }
  }
  return undefined;
}

/**
 * JSON listings: an array (or `{ files: [...] }`) of names or objects with
 * name, url, size, lastModified, contentType and etag (keys in any case)
 */
export function parseJsonListing(body: unknown, listingUrl: string): ListingEntry[] {
  const items = Array.isArray(body) ? body : isRecord(body) && Array.isArray(body.files) ? body.files : undefined;
  if (!items) {
    throw new RetrievalError('JSON listing is not an array of files', 'ProtocolError', { url: listingUrl });
  }

  const entries: ListingEntry[] = [];
  for (const item of items) {
    if (typeof item === 'string') {
      entries.push({
        name: item,
        url: new URL(encodeURIComponent(item), listingUrl).toString(),
        sizeBytes: null,
        lastModified: null,
        metadata: {},
      });
      continue;
    }
    if (!isRecord(item)) continue;

    const rawUrl = field(item, 'url', 'href');
    const rawName = field(item, 'name', 'filename');
    const url =
      typeof rawUrl === 'string'
        ? new URL(rawUrl, listingUrl).toString()
        : typeof rawName === 'string'
          ? new URL(encodeURIComponent(rawName), listingUrl).toString()
          : undefined;
    if (!url) continue;

    const metadata: Record<string, string> = {};
    const contentType = field(item, 'contentType');
    const etag = field(item, 'etag');
    if (typeof contentType === 'string') metadata.contentType = contentType;
    if (typeof etag === 'string') metadata.etag = etag;

    entries.push({
      name: typeof rawName === 'string' ? rawName : lastSegment(url),
      url,
      sizeBytes: numberOrNull(field(item, 'size', 'sizeBytes', 'length')),
      lastModified: parseDate(field(item, 'lastModified', 'modified', 'modifiedAt')),
      metadata,
    });
  }
  return entries;
}

/**
 * Anchors of an autoindex-style HTML page, without parent, query and
 * sub-directory links
 */
export function parseHtmlListing(html: string, listingUrl: string): ListingEntry[] {
  const { document } = new JSDOM(html, { url: listingUrl }).window;
  const listing = new URL(listingUrl);
  const seen = new Set<string>();
  const entries: ListingEntry[] = [];

  for (const anchor of Array.from(document.querySelectorAll('a[href]'))) {
    const href = anchor.getAttribute('href') ?? '';
    if (!href || href.startsWith('?') || href.startsWith('#') || href.startsWith('..')) continue;

    let resolved: URL;
    try {
      resolved = new URL(href, listingUrl);
    } catch {
      continue;
    }
    if (resolved.origin !== listing.origin || resolved.pathname.endsWith('/')) continue;

    resolved.hash = '';
    const url = resolved.toString();
    if (seen.has(url)) continue;
    seen.add(url);

    entries.push({ name: lastSegment(url), url, sizeBytes: null, lastModified: null, metadata: {} });
  }
  return entries;
}

export class WebAdapter implements ProtocolAdapter<WebSettings> {
  readonly protocol = 'web' as const;

  constructor(private readonly fetchImpl: FetchLike = (input, init) => fetch(input, init)) {}

  async list(request: ListRequest<WebSettings>): Promise<DiscoveredFile[]> {
    const { settings } = request;
    throwIfCancelled(request.signal);

    const listingUrl = directoryUrl(settings.baseUrl, request.path);
    const probe =
      settings.listingMode === 'probe' || (settings.listingMode === 'auto' && !hasGlob(request.namePattern));

    // A probed entry is the exact file asked for; only listings need the name filter
    const entries = probe
      ? await this.probe(request, listingUrl)
      : await this.fetchListing(request, listingUrl);
    const matched = probe
      ? entries
      : entries.filter((entry) => matchesName(entry.name, request.namePattern, request.extension));

    const discoveredAt = new Date().toISOString();
    const files = matched
      .map<DiscoveredFile>((entry) => ({
        filename: entry.name,
        locator: entry.url,
        sizeBytes: entry.sizeBytes,
        lastModified: entry.lastModified,
        discoveredAt,
        metadata: entry.metadata,
      }));

    logger.debug('Web listing complete', {
      url: listingUrl,
      probe,
      entries: entries.length,
      matched: files.length,
    }, 'WebAdapter');

    return limitResults(files, request.maxResults, 'WebAdapter');
  }

  async testConnection(settings: WebSettings, secret: string | undefined, signal: AbortSignal): Promise<void> {
    const response = await this.request(settings, secret, settings.baseUrl, 'HEAD', signal);
    if (!response.ok && response.status !== 405) {
      throw statusError(response, settings.baseUrl);
    }
  }

  private async probe(request: ListRequest<WebSettings>, listingUrl: string): Promise<ListingEntry[]> {
    const { settings } = request;
    let filename = request.namePattern;
    if (request.extension && !filename.toLowerCase().endsWith(`.${request.extension.toLowerCase()}`)) {
      filename = `${filename}.${request.extension.replace(/^\./, '')}`;
    }
    const url = new URL(encodeURIComponent(filename), listingUrl).toString();

    let response = await this.request(settings, request.secret, url, 'HEAD', request.signal);
    if (response.status === 405) {
      response = await this.request(settings, request.secret, url, 'GET', request.signal);
      await response.body?.cancel();
    }
    if (!response.ok) {
      throw statusError(response, url);
    }

    const metadata: Record<string, string> = {};
    const contentType = response.headers.get('content-type');
    const etag = response.headers.get('etag');
    if (contentType) metadata.contentType = contentType;
    if (etag) metadata.etag = etag;

    return [
      {
        name: filename,
        url,
        sizeBytes: numberOrNull(response.headers.get('content-length')),
        lastModified: parseDate(response.headers.get('last-modified')),
        metadata,
      },
    ];
  }

  private async fetchListing(request: ListRequest<WebSettings>, listingUrl: string): Promise<ListingEntry[]> {
    const { settings } = request;
    const response = await this.request(settings, request.secret, listingUrl, 'GET', request.signal);
    if (!response.ok) {
      throw statusError(response, listingUrl);
    }

    const contentType = (response.headers.get('content-type') ?? '').toLowerCase();
    const body = await this.readBody(response, listingUrl, request.signal);

    if (settings.listingMode === 'json' || (settings.listingMode === 'auto' && contentType.includes('json'))) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(body);
      } catch (error) {
        throw new RetrievalError(`Listing is not valid JSON: ${errorMessage(error)}`, 'ProtocolError', {
          url: listingUrl,
        });
      }
      return parseJsonListing(parsed, listingUrl);
    }

    if (settings.listingMode === 'html' || contentType.includes('html')) {
      return parseHtmlListing(body, listingUrl);
    }

    throw new RetrievalError(`Unsupported listing content type "${contentType || 'none'}"`, 'ProtocolError', {
      url: listingUrl,
    });
  }

  private async readBody(response: Response, url: string, signal: AbortSignal): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      throw this.transportError(error, url, signal);
    }
  }

  private async request(
    settings: WebSettings,
    secret: string | undefined,
    url: string,
    method: 'GET' | 'HEAD',
    signal: AbortSignal
  ): Promise<Response> {
    const timeout = AbortSignal.timeout(settings.timeoutMs ?? 30000);
    try {
      return await this.fetchImpl(url, {
        method,
        headers: {
          Accept: 'application/json, text/html;q=0.9, */*;q=0.5',
          ...authorizationHeaders(settings, secret),
        },
        redirect: 'follow',
        signal: AbortSignal.any([signal, timeout]),
      });
    } catch (error) {
      throw this.transportError(error, url, signal);
    }
  }

  private transportError(error: unknown, url: string, signal: AbortSignal): RetrievalError {
    if (error instanceof RetrievalError) return error;
    if (signal.aborted) {
      return new RetrievalError('Web listing was cancelled', 'Cancelled', { url }, { cause: error });
    }
    return new RetrievalError(`Request to ${url} failed: ${errorMessage(error)}`, 'NetworkError', { url }, {
      cause: error,
    });
  }
}
