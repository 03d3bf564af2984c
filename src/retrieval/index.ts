import Database from 'better-sqlite3';
import { AppConfig } from '../config.js';
import { AdapterRegistry } from './adapters/adapter.js';
import { BlobStoreAdapter } from './adapters/blob-adapter.js';
import { FtpAdapter } from './adapters/ftp-adapter.js';
import { WebAdapter } from './adapters/web-adapter.js';
import { ConfigurationStore } from './configuration-store.js';
import { CredentialResolver, EnvCredentialResolver } from './credentials.js';
import { ProcessedFileLedger } from './dedup-ledger.js';
import { ExecutionHistoryStore } from './execution-history.js';
import { LocalNotificationBus, NotificationTransport } from './notifications.js';
import { ExecutionOrchestrator } from './orchestrator.js';
import { RetrievalService } from './retrieval-service.js';
import { SchedulerLoop } from './scheduler-loop.js';

export * from './types.js';
export * from './errors.js';
export * from './token-resolver.js';
export * from './schedule-evaluator.js';
export * from './validation.js';
export * from './credentials.js';
export * from './notifications.js';
export * from './continuation.js';
export * from './configuration-store.js';
export * from './dedup-ledger.js';
export * from './execution-history.js';
export * from './execution-metrics.js';
export * from './orchestrator.js';
export * from './scheduler-loop.js';
export * from './retrieval-service.js';
export * from './adapters/adapter.js';
export { FtpAdapter, ftpLocator } from './adapters/ftp-adapter.js';
export type { FtpSession, FtpSessionFactory } from './adapters/ftp-adapter.js';
export { WebAdapter, directoryUrl, parseHtmlListing, parseJsonListing } from './adapters/web-adapter.js';
export type { FetchLike } from './adapters/web-adapter.js';
export { BlobStoreAdapter, createContainerClient, searchPrefix, serviceUrl } from './adapters/blob-adapter.js';
export type { BlobContainer, BlobContainerFactory, BlobListing } from './adapters/blob-adapter.js';

export interface RetrievalEngine {
  configurations: ConfigurationStore;
  history: ExecutionHistoryStore;
  ledger: ProcessedFileLedger;
  orchestrator: ExecutionOrchestrator;
  scheduler: SchedulerLoop;
  service: RetrievalService;
  transport: NotificationTransport;
}

export interface EngineOverrides {
  adapters?: Partial<AdapterRegistry>;
  transport?: NotificationTransport;
  credentials?: CredentialResolver;
  clock?: () => Date;
}

export function defaultAdapters(): AdapterRegistry {
  return {
    'file-transfer': new FtpAdapter(),
    web: new WebAdapter(),
    'blob-store': new BlobStoreAdapter(),
  };
}

/**
 * Wire stores, adapters, orchestrator, scheduler and service over one database
 */
export function createRetrievalEngine(
  db: Database.Database,
  config: AppConfig,
  overrides: EngineOverrides = {}
): RetrievalEngine {
  const clock = overrides.clock;
  const adapters: AdapterRegistry = { ...defaultAdapters(), ...overrides.adapters };
  const transport = overrides.transport ?? new LocalNotificationBus();
  const credentials = overrides.credentials ?? new EnvCredentialResolver(config.credentials.envPrefix);

  const configurations = new ConfigurationStore(db, clock);
  const history = new ExecutionHistoryStore(db, clock);
  const ledger = new ProcessedFileLedger(db, clock);

  const orchestrator = new ExecutionOrchestrator({
    configurations,
    history,
    ledger,
    adapters,
    transport,
    credentials,
    retry: config.retry,
    adapterOptions: config.adapters,
    notifications: config.notifications,
    clock,
  });

  const scheduler = new SchedulerLoop({ configurations, history, orchestrator, clock }, config.scheduler);

  const service = new RetrievalService({
    configurations,
    history,
    ledger,
    scheduler,
    adapters,
    credentials,
    callTimeoutMs: config.adapters.callTimeoutMs,
    clock,
  });

  return { configurations, history, ledger, orchestrator, scheduler, service, transport };
}
