import { minimatch } from 'minimatch';
import { logger } from '../../logger.js';
import { RetrievalError } from '../errors.js';
import {
  BlobStoreSettings,
  DiscoveredFile,
  FileTransferSettings,
  ProtocolSettings,
  WebSettings,
} from '../types.js';

export interface ListRequest<S extends ProtocolSettings = ProtocolSettings> {
  settings: S;
  /** Resolved secret for the settings' credential handle, if any */
  secret?: string;
  /** Directory-like path with tokens already resolved */
  path: string;
  /** Glob over file names with tokens already resolved */
  namePattern: string;
  extension?: string;
  signal: AbortSignal;
  maxResults: number;
}

export interface ProtocolAdapter<S extends ProtocolSettings> {
  readonly protocol: S['protocol'];
  list(request: ListRequest<S>): Promise<DiscoveredFile[]>;
  testConnection(settings: S, secret: string | undefined, signal: AbortSignal): Promise<void>;
}

export interface AdapterRegistry {
  'file-transfer': ProtocolAdapter<FileTransferSettings>;
  web: ProtocolAdapter<WebSettings>;
  'blob-store': ProtocolAdapter<BlobStoreSettings>;
}

export function listFiles(registry: AdapterRegistry, request: ListRequest): Promise<DiscoveredFile[]> {
  const { settings } = request;
  switch (settings.protocol) {
    case 'file-transfer':
      return registry['file-transfer'].list({ ...request, settings });
    case 'web':
      return registry.web.list({ ...request, settings });
    case 'blob-store':
      return registry['blob-store'].list({ ...request, settings });
  }
}

export function testConnection(
  registry: AdapterRegistry,
  settings: ProtocolSettings,
  secret: string | undefined,
  signal: AbortSignal
): Promise<void> {
  switch (settings.protocol) {
    case 'file-transfer':
      return registry['file-transfer'].testConnection(settings, secret, signal);
    case 'web':
      return registry.web.testConnection(settings, secret, signal);
    case 'blob-store':
      return registry['blob-store'].testConnection(settings, secret, signal);
  }
}

export function fileExtension(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot > 0 ? filename.slice(dot + 1) : '';
}

/**
 * Case-insensitive glob match on the name plus an exact extension match
 */
export function matchesName(filename: string, namePattern: string, extension?: string): boolean {
  if (!filename) return false;
  const pattern = namePattern.trim().length > 0 ? namePattern : '*';
  if (!minimatch(filename, pattern, { nocase: true, dot: true, nonegate: true, nocomment: true })) {
    return false;
  }
  if (extension) {
    const wanted = extension.replace(/^\./, '');
    return fileExtension(filename).toLowerCase() === wanted.toLowerCase();
  }
  return true;
}

export function hasGlob(pattern: string): boolean {
  return /[*?[\]{}]/.test(pattern);
}

export function limitResults(files: DiscoveredFile[], maxResults: number, context: string): DiscoveredFile[] {
  if (files.length <= maxResults) return files;
  logger.warn('Listing truncated to the configured maximum', {
    found: files.length,
    maxResults,
  }, context);
  return files.slice(0, maxResults);
}

/**
 * `/a//b/` -> `/a/b`; empty and `/` collapse to `/`
 */
export function normalizeRemotePath(path: string): string {
  const segments = path.split('/').filter((segment) => segment.length > 0);
  return `/${segments.join('/')}`;
}

export function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new RetrievalError('Listing was cancelled', 'Cancelled');
  }
}

export function parseDate(value: unknown): string | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (typeof value === 'string' && value.length > 0) {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
  }
  return null;
}

const TRANSIENT_SYSTEM_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
]);

export function isTransientSystemError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = 'code' in error ? error.code : undefined;
  return typeof code === 'string' && TRANSIENT_SYSTEM_CODES.has(code);
}
