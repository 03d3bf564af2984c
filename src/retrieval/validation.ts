import { ValidationError } from './errors.js';
import { isValidTimezone, parseCron } from './schedule-evaluator.js';
import { findUnknownTokens } from './token-resolver.js';
import {
  BlobAuthMode,
  BlobStoreSettings,
  CreateRetrievalConfigurationInput,
  FileTransferSettings,
  FtpSecurity,
  NotificationTarget,
  ProtocolSettings,
  RetrievalProtocol,
  ScheduleDefinition,
  TokenTimezone,
  WebAuthMode,
  WebListingMode,
  WebSettings,
} from './types.js';

export const LIMITS = {
  tenantId: 100,
  name: 200,
  description: 1000,
  pathPattern: 500,
  namePattern: 200,
  extension: 10,
  targetName: 200,
  payloadBytes: 10 * 1024,
} as const;

export const PROTOCOLS: readonly RetrievalProtocol[] = ['file-transfer', 'web', 'blob-store'];
const FTP_SECURITY: readonly FtpSecurity[] = ['none', 'explicit', 'implicit'];
const WEB_AUTH_MODES: readonly WebAuthMode[] = ['none', 'basic', 'bearer', 'api-key'];
const WEB_LISTING_MODES: readonly WebListingMode[] = ['auto', 'json', 'html', 'probe'];
const BLOB_AUTH_MODES: readonly BlobAuthMode[] = ['account-key', 'sas-token', 'connection-string'];
const TOKEN_TIMEZONES: readonly TokenTimezone[] = ['utc', 'schedule'];

const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/;
const MESSAGE_TYPE = /^[A-Za-z0-9_.:-]+$/;
const STORAGE_ACCOUNT = /^[a-z0-9]{3,24}$/;
const CONTAINER_NAME = /^(?!.*--)[a-z0-9][a-z0-9-]{1,61}[a-z0-9]$/;

function oneOf<T extends string>(allowed: readonly T[], value: unknown): value is T {
  return allowed.some((entry) => entry === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkText(
  problems: string[],
  label: string,
  value: string | undefined,
  maxLength: number,
  required: boolean
): void {
  if (value === undefined || value.trim().length === 0) {
    if (required) problems.push(`${label} is required`);
    return;
  }
  if (value.length > maxLength) {
    problems.push(`${label} must not exceed ${maxLength} characters`);
  }
  if (CONTROL_CHARACTERS.test(value)) {
    problems.push(`${label} must not contain control characters`);
  }
}

function checkTimeout(problems: string[], label: string, timeoutMs: number | undefined): void {
  if (timeoutMs !== undefined && (!Number.isFinite(timeoutMs) || timeoutMs <= 0)) {
    problems.push(`${label} timeout must be a positive number of milliseconds`);
  }
}

function validateFileTransfer(settings: FileTransferSettings, problems: string[]): void {
  checkText(problems, 'FTP host', settings.host, 255, true);
  if (settings.host.includes('{') || settings.host.includes('/')) {
    problems.push('FTP host must be a bare hostname without tokens or paths');
  }
  if (!Number.isInteger(settings.port) || settings.port < 1 || settings.port > 65535) {
    problems.push('FTP port must be an integer between 1 and 65535');
  }
  checkText(problems, 'FTP username', settings.username, 200, true);
  checkText(problems, 'FTP password handle', settings.passwordHandle, 200, true);
  if (!oneOf(FTP_SECURITY, settings.security)) {
    problems.push(`FTP security must be one of: ${FTP_SECURITY.join(', ')}`);
  }
  checkTimeout(problems, 'FTP', settings.timeoutMs);
}

function validateWeb(settings: WebSettings, problems: string[]): void {
  let url: URL | undefined;
  try {
    url = new URL(settings.baseUrl);
  } catch {
    problems.push('Web base URL must be an absolute URL');
  }
  if (url && url.protocol !== 'https:') {
    problems.push('Web base URL must use https');
  }
  if (settings.baseUrl.includes('{')) {
    problems.push('Web base URL must not contain tokens');
  }
  if (!oneOf(WEB_AUTH_MODES, settings.authMode)) {
    problems.push(`Web auth mode must be one of: ${WEB_AUTH_MODES.join(', ')}`);
  }
  if (settings.authMode === 'basic' && !settings.username) {
    problems.push('Basic authentication requires a username');
  }
  if (settings.authMode !== 'none' && !settings.secretHandle) {
    problems.push(`Web auth mode ${settings.authMode} requires a secret handle`);
  }
  if (settings.apiKeyHeader !== undefined && !/^[A-Za-z0-9-]+$/.test(settings.apiKeyHeader)) {
    problems.push('API key header must be a valid header name');
  }
  if (!oneOf(WEB_LISTING_MODES, settings.listingMode)) {
    problems.push(`Web listing mode must be one of: ${WEB_LISTING_MODES.join(', ')}`);
  }
  checkTimeout(problems, 'Web', settings.timeoutMs);
}

function validateBlobStore(settings: BlobStoreSettings, problems: string[]): void {
  if (!STORAGE_ACCOUNT.test(settings.accountName)) {
    problems.push('Storage account name must be 3-24 lowercase letters or digits');
  }
  if (!CONTAINER_NAME.test(settings.containerName)) {
    problems.push('Container name must be 3-63 lowercase letters, digits or single hyphens');
  }
  if (!oneOf(BLOB_AUTH_MODES, settings.authMode)) {
    problems.push(`Blob auth mode must be one of: ${BLOB_AUTH_MODES.join(', ')}`);
  }
  checkText(problems, 'Blob secret handle', settings.secretHandle, 200, true);
  if (settings.blobPrefix !== undefined && settings.blobPrefix.length > LIMITS.pathPattern) {
    problems.push(`Blob prefix must not exceed ${LIMITS.pathPattern} characters`);
  }
  if (settings.endpoint !== undefined) {
    try {
      new URL(settings.endpoint);
    } catch {
      problems.push('Blob endpoint must be an absolute URL');
    }
  }
  checkTimeout(problems, 'Blob', settings.timeoutMs);
}

export function validateProtocolSettings(
  protocol: RetrievalProtocol,
  settings: ProtocolSettings,
  problems: string[]
): void {
  if (settings.protocol !== protocol) {
    problems.push(`Settings for ${settings.protocol} do not match protocol ${protocol}`);
    return;
  }
  switch (settings.protocol) {
    case 'file-transfer':
      validateFileTransfer(settings, problems);
      return;
    case 'web':
      validateWeb(settings, problems);
      return;
    case 'blob-store':
      validateBlobStore(settings, problems);
      return;
  }
}

function validatePatterns(
  input: Pick<CreateRetrievalConfigurationInput, 'pathPattern' | 'namePattern' | 'extension'>,
  problems: string[]
): void {
  checkText(problems, 'Path pattern', input.pathPattern, LIMITS.pathPattern, true);
  checkText(problems, 'Name pattern', input.namePattern, LIMITS.namePattern, true);

  if (input.pathPattern.split(/[\\/]/).includes('..')) {
    problems.push('Path pattern must not contain ".." segments');
  }
  if (input.namePattern.includes('/')) {
    problems.push('Name pattern must not contain "/"');
  }
  if (input.pathPattern.startsWith('//')) {
    const serverEnd = input.pathPattern.indexOf('/', 2);
    const server = serverEnd > 0 ? input.pathPattern.slice(0, serverEnd) : input.pathPattern;
    if (server.includes('{')) {
      problems.push('Path pattern must not contain tokens in the server portion');
    }
  }

  for (const token of findUnknownTokens(input.pathPattern)) {
    problems.push(`Path pattern contains unknown token ${token}`);
  }
  for (const token of findUnknownTokens(input.namePattern)) {
    problems.push(`Name pattern contains unknown token ${token}`);
  }

  if (input.extension !== undefined && input.extension.length > 0) {
    const bare = input.extension.replace(/^\./, '');
    if (bare.length > LIMITS.extension) {
      problems.push(`Extension must not exceed ${LIMITS.extension} characters`);
    }
    if (!/^[A-Za-z0-9]+$/.test(bare)) {
      problems.push('Extension must be alphanumeric');
    }
  }
}

export function validateSchedule(schedule: ScheduleDefinition, problems: string[]): void {
  if (!schedule.cronExpression || schedule.cronExpression.trim().length === 0) {
    problems.push('Cron expression is required');
  } else {
    try {
      parseCron(schedule.cronExpression);
    } catch (error) {
      problems.push(...(error instanceof ValidationError ? error.problems : [String(error)]));
    }
  }
  if (!isValidTimezone(schedule.timezone)) {
    problems.push(`Timezone must be a valid IANA time zone: "${schedule.timezone}"`);
  }
}

export function validateTargets(targets: NotificationTarget[], problems: string[]): void {
  if (targets.length === 0) {
    problems.push('At least one notification target is required');
    return;
  }

  targets.forEach((target, index) => {
    const label = `Target ${index + 1}`;
    const typeName = target.kind === 'broadcast' ? target.eventType : target.commandType;
    checkText(problems, `${label} type`, typeName, LIMITS.targetName, true);
    if (typeName && !MESSAGE_TYPE.test(typeName)) {
      problems.push(`${label} type may only contain letters, digits and _ . : -`);
    }
    if (target.kind === 'directed') {
      checkText(problems, `${label} destination`, target.destination, LIMITS.targetName, true);
    }
    if (target.payload !== undefined) {
      const size = Buffer.byteLength(JSON.stringify(target.payload), 'utf8');
      if (size > LIMITS.payloadBytes) {
        problems.push(`${label} payload must not exceed ${LIMITS.payloadBytes} bytes when serialized`);
      }
    }
  });
}

export function collectConfigurationProblems(input: CreateRetrievalConfigurationInput): string[] {
  const problems: string[] = [];

  checkText(problems, 'Tenant id', input.tenantId, LIMITS.tenantId, true);
  checkText(problems, 'Name', input.name, LIMITS.name, true);
  checkText(problems, 'Description', input.description, LIMITS.description, false);
  checkText(problems, 'Created by', input.createdBy, LIMITS.name, true);

  if (!oneOf(PROTOCOLS, input.protocol)) {
    problems.push(`Protocol must be one of: ${PROTOCOLS.join(', ')}`);
  } else {
    validateProtocolSettings(input.protocol, input.settings, problems);
  }

  validatePatterns(input, problems);
  validateSchedule(input.schedule, problems);

  if (input.tokenTimezone !== undefined && !oneOf(TOKEN_TIMEZONES, input.tokenTimezone)) {
    problems.push(`Token timezone must be one of: ${TOKEN_TIMEZONES.join(', ')}`);
  }

  validateTargets(input.targets, problems);
  return problems;
}

export function assertValidConfiguration(input: CreateRetrievalConfigurationInput): void {
  const problems = collectConfigurationProblems(input);
  if (problems.length > 0) {
    throw new ValidationError(problems);
  }
}

// Untyped input (JSON files, CLI) -------------------------------------------

class FieldReader {
  constructor(
    private readonly source: Record<string, unknown>,
    private readonly prefix: string,
    private readonly problems: string[]
  ) {}

  string(key: string): string {
    const value = this.source[key];
    if (typeof value !== 'string') {
      this.problems.push(`${this.prefix}${key} must be a string`);
      return '';
    }
    return value;
  }

  optionalString(key: string): string | undefined {
    const value = this.source[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') {
      this.problems.push(`${this.prefix}${key} must be a string`);
      return undefined;
    }
    return value;
  }

  number(key: string): number {
    const value = this.source[key];
    if (typeof value !== 'number') {
      this.problems.push(`${this.prefix}${key} must be a number`);
      return 0;
    }
    return value;
  }

  optionalNumber(key: string): number | undefined {
    const value = this.source[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'number') {
      this.problems.push(`${this.prefix}${key} must be a number`);
      return undefined;
    }
    return value;
  }

  optionalBoolean(key: string): boolean | undefined {
    const value = this.source[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'boolean') {
      this.problems.push(`${this.prefix}${key} must be a boolean`);
      return undefined;
    }
    return value;
  }

  choice<T extends string>(key: string, allowed: readonly T[], fallback?: T): T {
    const value = this.source[key];
    if (value === undefined && fallback !== undefined) return fallback;
    if (!oneOf(allowed, value)) {
      this.problems.push(`${this.prefix}${key} must be one of: ${allowed.join(', ')}`);
      return fallback ?? allowed[0];
    }
    return value;
  }

  record(key: string): Record<string, unknown> | undefined {
    const value = this.source[key];
    if (value === undefined || value === null) return undefined;
    if (!isRecord(value)) {
      this.problems.push(`${this.prefix}${key} must be an object`);
      return undefined;
    }
    return value;
  }
}

function parseSettings(protocol: RetrievalProtocol, raw: Record<string, unknown>, problems: string[]): ProtocolSettings {
  const read = new FieldReader(raw, 'settings.', problems);
  switch (protocol) {
    case 'file-transfer':
      return {
        protocol,
        host: read.string('host'),
        port: read.optionalNumber('port') ?? 21,
        username: read.string('username'),
        passwordHandle: read.string('passwordHandle'),
        security: read.choice('security', FTP_SECURITY, 'none'),
        timeoutMs: read.optionalNumber('timeoutMs'),
      };
    case 'web':
      return {
        protocol,
        baseUrl: read.string('baseUrl'),
        authMode: read.choice('authMode', WEB_AUTH_MODES, 'none'),
        username: read.optionalString('username'),
        secretHandle: read.optionalString('secretHandle'),
        apiKeyHeader: read.optionalString('apiKeyHeader'),
        listingMode: read.choice('listingMode', WEB_LISTING_MODES, 'auto'),
        timeoutMs: read.optionalNumber('timeoutMs'),
      };
    case 'blob-store':
      return {
        protocol,
        accountName: read.string('accountName'),
        containerName: read.string('containerName'),
        authMode: read.choice('authMode', BLOB_AUTH_MODES),
        secretHandle: read.string('secretHandle'),
        blobPrefix: read.optionalString('blobPrefix'),
        endpoint: read.optionalString('endpoint'),
        timeoutMs: read.optionalNumber('timeoutMs'),
      };
  }
}

function parseTargets(raw: unknown, problems: string[]): NotificationTarget[] {
  if (!Array.isArray(raw)) {
    problems.push('targets must be an array');
    return [];
  }
  const targets: NotificationTarget[] = [];
  raw.forEach((entry: unknown, index) => {
    if (!isRecord(entry)) {
      problems.push(`targets[${index}] must be an object`);
      return;
    }
    const read = new FieldReader(entry, `targets[${index}].`, problems);
    const kind = read.choice('kind', ['broadcast', 'directed'] as const);
    const payload = read.record('payload');
    if (kind === 'broadcast') {
      targets.push({ kind, eventType: read.string('eventType'), payload });
    } else {
      targets.push({ kind, commandType: read.string('commandType'), destination: read.string('destination'), payload });
    }
  });
  return targets;
}

/**
 * Shape-check untyped input, then apply the same rules as
 * {@link assertValidConfiguration}. Every problem is reported at once.
 */
export function parseConfigurationInput(raw: unknown): CreateRetrievalConfigurationInput {
  if (!isRecord(raw)) {
    throw new ValidationError(['Configuration must be a JSON object']);
  }

  const problems: string[] = [];
  const read = new FieldReader(raw, '', problems);
  const protocol = read.choice('protocol', PROTOCOLS);
  const settings = parseSettings(protocol, read.record('settings') ?? {}, problems);
  const scheduleRaw = read.record('schedule') ?? {};
  const scheduleReader = new FieldReader(scheduleRaw, 'schedule.', problems);

  const input: CreateRetrievalConfigurationInput = {
    id: read.optionalString('id'),
    tenantId: read.string('tenantId'),
    name: read.string('name'),
    description: read.optionalString('description'),
    protocol,
    settings,
    pathPattern: read.string('pathPattern'),
    namePattern: read.string('namePattern'),
    extension: read.optionalString('extension'),
    schedule: {
      cronExpression: scheduleReader.string('cronExpression'),
      timezone: scheduleReader.optionalString('timezone') ?? 'UTC',
      description: scheduleReader.optionalString('description'),
    },
    tokenTimezone: read.choice('tokenTimezone', TOKEN_TIMEZONES, 'utc'),
    active: read.optionalBoolean('active'),
    targets: parseTargets(raw.targets, problems),
    createdBy: read.optionalString('createdBy') ?? 'cli',
  };

  if (problems.length > 0) {
    throw new ValidationError(problems);
  }
  assertValidConfiguration(input);
  return input;
}

// Stored rows -----------------------------------------------------------------

function readOrThrow<T>(parse: (problems: string[]) => T): T {
  const problems: string[] = [];
  const value = parse(problems);
  if (problems.length > 0) {
    throw new ValidationError(problems);
  }
  return value;
}

export function readProtocol(value: unknown): RetrievalProtocol {
  if (!oneOf(PROTOCOLS, value)) {
    throw new ValidationError([`Unknown protocol "${String(value)}"`]);
  }
  return value;
}

export function readTokenTimezone(value: unknown): TokenTimezone {
  return oneOf(TOKEN_TIMEZONES, value) ? value : 'utc';
}

export function readProtocolSettings(protocol: RetrievalProtocol, raw: unknown): ProtocolSettings {
  return readOrThrow((problems) => parseSettings(protocol, isRecord(raw) ? raw : {}, problems));
}

export function readTargets(raw: unknown): NotificationTarget[] {
  return readOrThrow((problems) => parseTargets(raw, problems));
}
