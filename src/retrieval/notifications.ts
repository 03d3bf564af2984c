import { randomUUID } from 'crypto';
import { logger } from '../logger.js';
import { errorMessage, RetrievalError } from './errors.js';
import { DiscoveredFile, NotificationTarget, RetrievalConfiguration, RetrievalProtocol } from './types.js';

export type NotificationMode = 'broadcast' | 'directed';

export type LifecycleEventType = 'FileCheckTriggered' | 'FileCheckCompleted' | 'FileCheckFailed';

export interface FileDetails {
  filename: string;
  locator: string;
  sizeBytes: number | null;
  lastModified: string | null;
  discoveredAt: string;
  discoveryDate: string;
}

export interface NotificationMessage {
  messageId: string;
  mode: NotificationMode;
  /** Event type for broadcasts, command type for directed messages */
  type: string;
  destination: string | null;
  idempotencyKey: string;
  correlationId: string;
  occurredAt: string;
  tenantId: string;
  configurationId: string;
  configurationName: string;
  protocol: RetrievalProtocol;
  executionId: string;
  file?: FileDetails;
  payload: Record<string, unknown>;
}

export type NotificationHandler = (message: NotificationMessage) => void | Promise<void>;

/**
 * Outbound messaging boundary: at-least-once delivery is assumed, consumers
 * deduplicate on `idempotencyKey`.
 */
export interface NotificationTransport {
  publish(message: NotificationMessage): Promise<void>;
  send(message: NotificationMessage): Promise<void>;
}

/**
 * In-process transport: broadcast subscribers and one handler list per
 * destination, awaited in registration order.
 */
export class LocalNotificationBus implements NotificationTransport {
  private readonly subscribers: NotificationHandler[] = [];
  private readonly destinations = new Map<string, NotificationHandler[]>();

  subscribe(handler: NotificationHandler): () => void {
    this.subscribers.push(handler);
    return () => {
      const index = this.subscribers.indexOf(handler);
      if (index >= 0) this.subscribers.splice(index, 1);
    };
  }

  handle(destination: string, handler: NotificationHandler): () => void {
    const handlers = this.destinations.get(destination) ?? [];
    handlers.push(handler);
    this.destinations.set(destination, handlers);
    return () => {
      const index = handlers.indexOf(handler);
      if (index >= 0) handlers.splice(index, 1);
    };
  }

  async publish(message: NotificationMessage): Promise<void> {
    for (const handler of [...this.subscribers]) {
      await handler(message);
    }
  }

  async send(message: NotificationMessage): Promise<void> {
    const handlers = message.destination ? this.destinations.get(message.destination) : undefined;
    if (!handlers || handlers.length === 0) {
      throw new RetrievalError(`No handler registered for destination "${message.destination}"`, 'NotificationFailed', {
        destination: message.destination,
        type: message.type,
      });
    }
    for (const handler of [...handlers]) {
      await handler(message);
    }
  }
}

export interface FileNotificationContext {
  configuration: RetrievalConfiguration;
  executionId: string;
  correlationId: string;
  file: DiscoveredFile;
  discoveryDate: string;
}

const PLACEHOLDER = /\{(\w+)\}/g;
const SOLE_PLACEHOLDER = /^\{(\w+)\}$/;

function placeholderValues(context: FileNotificationContext): Record<string, string | number | null> {
  return {
    filename: context.file.filename,
    locator: context.file.locator,
    sizeBytes: context.file.sizeBytes,
    lastModified: context.file.lastModified,
    discoveredAt: context.file.discoveredAt,
    discoveryDate: context.discoveryDate,
    configurationId: context.configuration.id,
    configurationName: context.configuration.name,
    tenantId: context.configuration.tenantId,
    executionId: context.executionId,
  };
}

/**
 * Fill `{filename}`-style placeholders in every string of a payload.
 * A string that is exactly one placeholder takes the raw value, so
 * `"{sizeBytes}"` becomes a number.
 */
export function substitutePlaceholders(
  value: unknown,
  values: Record<string, string | number | null>
): unknown {
  if (typeof value === 'string') {
    const sole = SOLE_PLACEHOLDER.exec(value);
    if (sole && sole[1] in values) {
      return values[sole[1]];
    }
    return value.replace(PLACEHOLDER, (match, name: string) =>
      name in values ? String(values[name] ?? '') : match
    );
  }
  if (Array.isArray(value)) {
    return value.map((entry: unknown) => substitutePlaceholders(entry, values));
  }
  if (typeof value === 'object' && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = substitutePlaceholders(entry, values);
    }
    return result;
  }
  return value;
}

function substitutePayload(
  payload: Record<string, unknown> | undefined,
  values: Record<string, string | number | null>
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(payload ?? {})) {
    result[key] = substitutePlaceholders(entry, values);
  }
  return result;
}

export function fileIdempotencyKey(
  configuration: Pick<RetrievalConfiguration, 'tenantId' | 'id'>,
  locator: string,
  discoveryDate: string,
  targetIndex: number,
  type: string
): string {
  return `${configuration.tenantId}:${configuration.id}:${locator}:${discoveryDate}:${targetIndex}:${type}`;
}

export function buildFileNotification(
  target: NotificationTarget,
  targetIndex: number,
  context: FileNotificationContext
): NotificationMessage {
  const { configuration, file } = context;
  const type = target.kind === 'broadcast' ? target.eventType : target.commandType;

  return {
    messageId: randomUUID(),
    mode: target.kind,
    type,
    destination: target.kind === 'directed' ? target.destination : null,
    idempotencyKey: fileIdempotencyKey(configuration, file.locator, context.discoveryDate, targetIndex, type),
    correlationId: context.correlationId,
    occurredAt: new Date().toISOString(),
    tenantId: configuration.tenantId,
    configurationId: configuration.id,
    configurationName: configuration.name,
    protocol: configuration.protocol,
    executionId: context.executionId,
    file: {
      filename: file.filename,
      locator: file.locator,
      sizeBytes: file.sizeBytes,
      lastModified: file.lastModified,
      discoveredAt: file.discoveredAt,
      discoveryDate: context.discoveryDate,
    },
    payload: substitutePayload(target.payload, placeholderValues(context)),
  };
}

export interface EmissionOutcome {
  emitted: number;
  failed: number;
  errors: string[];
}

/**
 * Emit one message per target. A failing target does not stop the rest.
 */
export async function emitFileNotifications(
  transport: NotificationTransport,
  context: FileNotificationContext
): Promise<EmissionOutcome> {
  const outcome: EmissionOutcome = { emitted: 0, failed: 0, errors: [] };

  for (const [index, target] of context.configuration.targets.entries()) {
    const message = buildFileNotification(target, index, context);
    try {
      if (message.mode === 'broadcast') {
        await transport.publish(message);
      } else {
        await transport.send(message);
      }
      outcome.emitted++;
    } catch (error) {
      outcome.failed++;
      outcome.errors.push(`${message.type}: ${errorMessage(error)}`);
      logger.warn('Notification emission failed', {
        executionId: context.executionId,
        type: message.type,
        mode: message.mode,
        locator: context.file.locator,
        error: errorMessage(error),
      }, 'Notifications');
    }
  }

  return outcome;
}

export function buildLifecycleNotification(
  type: LifecycleEventType,
  configuration: RetrievalConfiguration,
  executionId: string,
  correlationId: string,
  payload: Record<string, unknown>
): NotificationMessage {
  return {
    messageId: randomUUID(),
    mode: 'broadcast',
    type,
    destination: null,
    idempotencyKey: `${configuration.tenantId}:${configuration.id}:${executionId}:${type}`,
    correlationId,
    occurredAt: new Date().toISOString(),
    tenantId: configuration.tenantId,
    configurationId: configuration.id,
    configurationName: configuration.name,
    protocol: configuration.protocol,
    executionId,
    payload,
  };
}
