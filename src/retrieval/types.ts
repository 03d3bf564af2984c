export type RetrievalProtocol = 'file-transfer' | 'web' | 'blob-store';

export type FtpSecurity = 'none' | 'explicit' | 'implicit';
export type WebAuthMode = 'none' | 'basic' | 'bearer' | 'api-key';
export type WebListingMode = 'auto' | 'json' | 'html' | 'probe';
export type BlobAuthMode = 'account-key' | 'sas-token' | 'connection-string';

export interface FileTransferSettings {
  protocol: 'file-transfer';
  host: string;
  port: number;
  username: string;
  /** Credential handle, resolved per execution; never the password itself */
  passwordHandle: string;
  security: FtpSecurity;
  timeoutMs?: number;
}

export interface WebSettings {
  protocol: 'web';
  /** https:// root that resolved paths are appended to */
  baseUrl: string;
  authMode: WebAuthMode;
  username?: string;
  secretHandle?: string;
  /** Header carrying the key when authMode is api-key (default X-API-Key) */
  apiKeyHeader?: string;
  listingMode: WebListingMode;
  timeoutMs?: number;
}

export interface BlobStoreSettings {
  protocol: 'blob-store';
  accountName: string;
  containerName: string;
  authMode: BlobAuthMode;
  secretHandle: string;
  blobPrefix?: string;
  /** Service URL override, e.g. a local emulator */
  endpoint?: string;
  timeoutMs?: number;
}

export type ProtocolSettings = FileTransferSettings | WebSettings | BlobStoreSettings;

export type SettingsFor<P extends RetrievalProtocol> = Extract<ProtocolSettings, { protocol: P }>;

export interface BroadcastTarget {
  kind: 'broadcast';
  eventType: string;
  payload?: Record<string, unknown>;
}

export interface DirectedTarget {
  kind: 'directed';
  commandType: string;
  destination: string;
  payload?: Record<string, unknown>;
}

export type NotificationTarget = BroadcastTarget | DirectedTarget;

export interface ScheduleDefinition {
  cronExpression: string;
  timezone: string;
  description?: string;
}

/** Which calendar date fills date tokens: UTC or the schedule's zone */
export type TokenTimezone = 'utc' | 'schedule';

export interface RetrievalConfiguration {
  id: string;
  tenantId: string;
  name: string;
  description?: string;
  protocol: RetrievalProtocol;
  settings: ProtocolSettings;
  pathPattern: string;
  namePattern: string;
  extension?: string;
  schedule: ScheduleDefinition;
  tokenTimezone: TokenTimezone;
  active: boolean;
  targets: NotificationTarget[];
  createdAt: string;
  createdBy: string;
  modifiedAt?: string;
  modifiedBy?: string;
  lastExecutedAt?: string;
  nextScheduledRun?: string;
  version: number;
}

export interface CreateRetrievalConfigurationInput {
  id?: string;
  tenantId: string;
  name: string;
  description?: string;
  protocol: RetrievalProtocol;
  settings: ProtocolSettings;
  pathPattern: string;
  namePattern: string;
  extension?: string;
  schedule: ScheduleDefinition;
  tokenTimezone?: TokenTimezone;
  active?: boolean;
  targets: NotificationTarget[];
  createdBy: string;
}

export interface UpdateRetrievalConfigurationInput {
  name?: string;
  description?: string;
  settings?: ProtocolSettings;
  pathPattern?: string;
  namePattern?: string;
  extension?: string | null;
  schedule?: ScheduleDefinition;
  tokenTimezone?: TokenTimezone;
  active?: boolean;
  targets?: NotificationTarget[];
  modifiedBy: string;
}

export interface DiscoveredFile {
  filename: string;
  /** Absolute, protocol-specific address of the file */
  locator: string;
  sizeBytes: number | null;
  lastModified: string | null;
  discoveredAt: string;
  metadata: Record<string, string>;
}

export interface ProcessedFileRecord {
  id: string;
  tenantId: string;
  configurationId: string;
  executionId: string;
  filename: string;
  locator: string;
  discoveryDate: string;
  processedAt: string;
  sizeBytes: number | null;
  lastModified: string | null;
}

export interface MarkProcessedInput {
  tenantId: string;
  configurationId: string;
  executionId: string;
  filename: string;
  locator: string;
  /** YYYY-MM-DD */
  discoveryDate: string;
  sizeBytes?: number | null;
  lastModified?: string | null;
}

export type ExecutionStatus = 'Pending' | 'Running' | 'Completed' | 'Failed';
export type TerminalStatus = Extract<ExecutionStatus, 'Completed' | 'Failed'>;
export type ExecutionTrigger = 'scheduled' | 'manual';

export type ExecutionErrorCategory =
  | 'AuthenticationFailed'
  | 'NetworkError'
  | 'ProtocolError'
  | 'NotificationFailed'
  | 'Cancelled'
  | 'InternalError';

export interface ExecutionRecord {
  id: string;
  tenantId: string;
  configurationId: string;
  trigger: ExecutionTrigger;
  status: ExecutionStatus;
  correlationId: string;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  durationMs: number | null;
  filesFound: number;
  filesProcessed: number;
  notificationsEmitted: number;
  notificationFailures: number;
  retryCount: number;
  resolvedPath: string | null;
  resolvedNamePattern: string | null;
  errorCategory: ExecutionErrorCategory | null;
  errorMessage: string | null;
}

export interface ExecutionCompletion {
  status: TerminalStatus;
  filesFound: number;
  filesProcessed: number;
  notificationsEmitted: number;
  notificationFailures: number;
  retryCount: number;
  resolvedPath: string | null;
  resolvedNamePattern: string | null;
  errorCategory?: ExecutionErrorCategory;
  errorMessage?: string;
}

export interface Page<T> {
  items: T[];
  continuationToken: string | null;
}

export interface PageRequest {
  limit?: number;
  continuationToken?: string | null;
}

export interface ExecutionQuery extends PageRequest {
  status?: ExecutionStatus;
  from?: Date;
  to?: Date;
}

export interface ProcessedFileQuery extends PageRequest {
  filename?: string;
  executionId?: string;
}

export interface ExecutionMetrics {
  configurationId: string;
  windowStart: string;
  windowEnd: string;
  totalExecutions: number;
  successfulExecutions: number;
  failedExecutions: number;
  inProgressExecutions: number;
  /** 0..1 over terminal executions; null when none finished in the window */
  successRate: number | null;
  averageDurationMs: number | null;
  totalFilesDiscovered: number;
  totalFilesProcessed: number;
  filesDiscoveredPerDay: Record<string, number>;
  failuresByCategory: Partial<Record<ExecutionErrorCategory, number>>;
}
