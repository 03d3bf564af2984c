/**
 * Builders and in-process stand-ins shared by the retrieval tests
 */

import Database from 'better-sqlite3';
import { DEFAULT_CONFIG, AppConfig } from '../config.js';
import { IN_MEMORY, openDatabase } from '../database.js';
import { AdapterRegistry, ListRequest, ProtocolAdapter } from '../retrieval/adapters/adapter.js';
import { CredentialResolver } from '../retrieval/credentials.js';
import { RetrievalError } from '../retrieval/errors.js';
import {
  BlobStoreSettings,
  CreateRetrievalConfigurationInput,
  DiscoveredFile,
  FileTransferSettings,
  ProtocolSettings,
  WebSettings,
} from '../retrieval/types.js';

export class TestClock {
  private current: number;

  constructor(iso: string) {
    this.current = new Date(iso).getTime();
  }

  readonly now = (): Date => new Date(this.current);

  set(iso: string): void {
    this.current = new Date(iso).getTime();
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export function memoryDatabase(): Database.Database {
  return openDatabase(IN_MEMORY);
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    retry: { attempts: 3, minTimeoutMs: 0, maxTimeoutMs: 0, factor: 1 },
    adapters: { callTimeoutMs: 1000, maxResults: 1000 },
    notifications: { lifecycleEvents: false },
    scheduler: {
      ...DEFAULT_CONFIG.scheduler,
      pollingIntervalMs: 1000,
      maxConcurrentExecutions: 4,
      executionTimeoutMs: 5000,
      abandonedGraceMs: 1000,
    },
    ...overrides,
  };
}

export function ftpInput(overrides: Partial<CreateRetrievalConfigurationInput> = {}): CreateRetrievalConfigurationInput {
  return {
    id: 'daily-ach',
    tenantId: 'tenant-a',
    name: 'Daily ACH files',
    protocol: 'file-transfer',
    settings: {
      protocol: 'file-transfer',
      host: 'ftp.example.test',
      port: 21,
      username: 'reader',
      passwordHandle: 'ftp/partner-a',
      security: 'none',
    },
    pathPattern: '/files/{yyyy}/{mm}/{dd}',
    namePattern: '*.csv',
    schedule: { cronExpression: '0 0 * * *', timezone: 'UTC' },
    targets: [{ kind: 'broadcast', eventType: 'FileDiscovered', payload: { name: '{filename}' } }],
    createdBy: 'test-user',
    ...overrides,
  };
}

export function webSettings(overrides: Partial<WebSettings> = {}): WebSettings {
  return {
    protocol: 'web',
    baseUrl: 'https://files.example.test/exports',
    authMode: 'none',
    listingMode: 'auto',
    ...overrides,
  };
}

export function blobSettings(overrides: Partial<BlobStoreSettings> = {}): BlobStoreSettings {
  return {
    protocol: 'blob-store',
    accountName: 'teststorage',
    containerName: 'inbound',
    authMode: 'connection-string',
    secretHandle: 'blob/inbound',
    ...overrides,
  };
}

export function discovered(filename: string, overrides: Partial<DiscoveredFile> = {}): DiscoveredFile {
  return {
    filename,
    locator: `ftp://ftp.example.test:21/files/2026/02/23/${filename}`,
    sizeBytes: 128,
    lastModified: '2026-02-22T23:00:00.000Z',
    discoveredAt: '2026-02-23T00:00:00.000Z',
    metadata: {},
    ...overrides,
  };
}

type ListStep<S extends ProtocolSettings> =
  | DiscoveredFile[]
  | Error
  | ((request: ListRequest<S>) => Promise<DiscoveredFile[]>);

/**
 * Adapter that answers list calls from a queue of canned results
 */
export class ScriptedAdapter<S extends ProtocolSettings> implements ProtocolAdapter<S> {
  readonly requests: ListRequest<S>[] = [];
  connectionError: Error | null = null;
  private readonly steps: ListStep<S>[] = [];

  constructor(
    readonly protocol: S['protocol'],
    private readonly fallback: DiscoveredFile[] = []
  ) {}

  enqueue(...steps: ListStep<S>[]): this {
    this.steps.push(...steps);
    return this;
  }

  async list(request: ListRequest<S>): Promise<DiscoveredFile[]> {
    this.requests.push(request);
    const step = this.steps.shift() ?? this.fallback;
    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === 'function') {
      return step(request);
    }
    return step;
  }

  async testConnection(): Promise<void> {
    if (this.connectionError) {
      throw this.connectionError;
    }
  }
}

export interface ScriptedRegistry {
  registry: AdapterRegistry;
  ftp: ScriptedAdapter<FileTransferSettings>;
  web: ScriptedAdapter<WebSettings>;
  blob: ScriptedAdapter<BlobStoreSettings>;
}

export function scriptedRegistry(): ScriptedRegistry {
  const ftp = new ScriptedAdapter<FileTransferSettings>('file-transfer');
  const web = new ScriptedAdapter<WebSettings>('web');
  const blob = new ScriptedAdapter<BlobStoreSettings>('blob-store');
  return { registry: { 'file-transfer': ftp, web, 'blob-store': blob }, ftp, web, blob };
}

/**
 * Resolves every handle from a fixed map
 */
export class StaticCredentialResolver implements CredentialResolver {
  readonly resolved: string[] = [];

  constructor(private readonly secrets: Record<string, string> = { 'ftp/partner-a': 'test-secret' }) {}

  async resolve(handle: string): Promise<string> {
    this.resolved.push(handle);
    const secret = this.secrets[handle];
    if (secret === undefined) {
      throw new RetrievalError(`Unknown handle ${handle}`, 'AuthenticationFailed');
    }
    return secret;
  }
}

/**
 * A list step that never settles on its own and rejects once aborted
 */
export function hangUntilAborted<S extends ProtocolSettings>(): (request: ListRequest<S>) => Promise<DiscoveredFile[]> {
  return (request) =>
    new Promise<DiscoveredFile[]>((_, reject) => {
      request.signal.addEventListener('abort', () => reject(new RetrievalError('aborted', 'Cancelled')), {
        once: true,
      });
    });
}
