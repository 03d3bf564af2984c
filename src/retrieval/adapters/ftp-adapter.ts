import { Client, FTPError, FileInfo } from 'basic-ftp';
import { logger } from '../../logger.js';
import { errorMessage, RetrievalError } from '../errors.js';
import { DiscoveredFile, FileTransferSettings } from '../types.js';
import {
  isTransientSystemError,
  limitResults,
  ListRequest,
  matchesName,
  normalizeRemotePath,
  ProtocolAdapter,
  throwIfCancelled,
} from './adapter.js';

const DEFAULT_TIMEOUT_MS = 30000;

// FTP reply codes
const NOT_LOGGED_IN = 530;
const FILE_UNAVAILABLE = 550;
const TRANSIENT_REPLIES = new Set([421, 425, 426, 450, 451, 452]);

/**
 * Subset of the basic-ftp client this adapter drives
 */
export interface FtpSession {
  access(options: {
    host: string;
    port: number;
    user: string;
    password: string;
    secure: boolean | 'implicit';
  }): Promise<unknown>;
  list(path?: string): Promise<FileInfo[]>;
  pwd(): Promise<string>;
  close(): void;
}

export type FtpSessionFactory = (timeoutMs: number) => FtpSession;

function secureMode(settings: FileTransferSettings): boolean | 'implicit' {
  switch (settings.security) {
    case 'none':
      return false;
    case 'explicit':
      return true;
    case 'implicit':
      return 'implicit';
  }
}

export function ftpLocator(settings: FileTransferSettings, directory: string, filename: string): string {
  const scheme = settings.security === 'none' ? 'ftp' : 'ftps';
  const base = directory === '/' ? '' : directory;
  return `${scheme}://${settings.host}:${settings.port}${base}/${filename}`;
}

export class FtpAdapter implements ProtocolAdapter<FileTransferSettings> {
  readonly protocol = 'file-transfer' as const;

  constructor(private readonly createSession: FtpSessionFactory = (timeoutMs) => new Client(timeoutMs)) {}

  async list(request: ListRequest<FileTransferSettings>): Promise<DiscoveredFile[]> {
    const { settings } = request;
    const directory = normalizeRemotePath(request.path);

    const entries = await this.withSession(settings, request.secret, request.signal, (session) =>
      session.list(directory)
    );

    const discoveredAt = new Date().toISOString();
    const files: DiscoveredFile[] = [];
    for (const entry of entries) {
      if (!entry.isFile) continue;
      if (!matchesName(entry.name, request.namePattern, request.extension)) continue;

      files.push({
        filename: entry.name,
        locator: ftpLocator(settings, directory, entry.name),
        sizeBytes: Number.isFinite(entry.size) && entry.size >= 0 ? entry.size : null,
        lastModified: entry.modifiedAt ? entry.modifiedAt.toISOString() : null,
        discoveredAt,
        metadata: entry.rawModifiedAt ? { rawModifiedAt: entry.rawModifiedAt } : {},
      });
    }

    logger.debug('FTP listing complete', {
      host: settings.host,
      directory,
      entries: entries.length,
      matched: files.length,
    }, 'FtpAdapter');

    return limitResults(files, request.maxResults, 'FtpAdapter');
  }

  async testConnection(settings: FileTransferSettings, secret: string | undefined, signal: AbortSignal): Promise<void> {
    await this.withSession(settings, secret, signal, (session) => session.pwd());
  }

  private async withSession<T>(
    settings: FileTransferSettings,
    secret: string | undefined,
    signal: AbortSignal,
    work: (session: FtpSession) => Promise<T>
  ): Promise<T> {
    throwIfCancelled(signal);
    const session = this.createSession(settings.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    // Closing the session rejects whatever command is in flight
    const onAbort = () => session.close();
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      await session.access({
        host: settings.host,
        port: settings.port,
        user: settings.username,
        password: secret ?? '',
        secure: secureMode(settings),
      });
      return await work(session);
    } catch (error) {
      throw this.classify(error, settings, signal);
    } finally {
      signal.removeEventListener('abort', onAbort);
      session.close();
    }
  }

  private classify(error: unknown, settings: FileTransferSettings, signal: AbortSignal): RetrievalError {
    if (error instanceof RetrievalError) return error;
    const context = { host: settings.host, port: settings.port };

    if (signal.aborted) {
      return new RetrievalError('FTP listing was cancelled', 'Cancelled', context, { cause: error });
    }
    if (error instanceof FTPError) {
      if (error.code === NOT_LOGGED_IN) {
        return new RetrievalError(`FTP login rejected: ${error.message}`, 'AuthenticationFailed', context, {
          cause: error,
        });
      }
      if (error.code === FILE_UNAVAILABLE) {
        return new RetrievalError(`FTP path not found: ${error.message}`, 'NotFound', context, { cause: error });
      }
      if (TRANSIENT_REPLIES.has(error.code)) {
        return new RetrievalError(`FTP server unavailable: ${error.message}`, 'NetworkError', context, {
          cause: error,
        });
      }
      return new RetrievalError(`FTP protocol error ${error.code}: ${error.message}`, 'ProtocolError', context, {
        cause: error,
      });
    }
    if (isTransientSystemError(error) || /timeout|closed|socket/i.test(errorMessage(error))) {
      return new RetrievalError(`FTP connection failed: ${errorMessage(error)}`, 'NetworkError', context, {
        cause: error,
      });
    }
    return new RetrievalError(`FTP listing failed: ${errorMessage(error)}`, 'ProtocolError', context, {
      cause: error,
    });
  }
}
