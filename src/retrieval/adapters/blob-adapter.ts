import { BlobServiceClient, RestError, StorageSharedKeyCredential } from '@azure/storage-blob';
import { logger } from '../../logger.js';
import { errorMessage, RetrievalError } from '../errors.js';
import { BlobStoreSettings, DiscoveredFile } from '../types.js';
import { isTransientSystemError, limitResults, ListRequest, matchesName, ProtocolAdapter, throwIfCancelled } from './adapter.js';

export interface BlobListing {
  name: string;
  properties: {
    contentLength?: number;
    lastModified?: Date;
    etag?: string;
    contentType?: string;
  };
}

/**
 * The slice of a ContainerClient the adapter needs
 */
export interface BlobContainer {
  readonly url: string;
  listBlobsFlat(options?: { prefix?: string; abortSignal?: AbortSignal }): AsyncIterable<BlobListing>;
  exists(options?: { abortSignal?: AbortSignal }): Promise<boolean>;
}

export type BlobContainerFactory = (settings: BlobStoreSettings, secret: string) => BlobContainer;

export function serviceUrl(settings: BlobStoreSettings): string {
  return (settings.endpoint ?? `https://${settings.accountName}.blob.core.windows.net`).replace(/\/+$/, '');
}

export function createContainerClient(settings: BlobStoreSettings, secret: string): BlobContainer {
  let service: BlobServiceClient;
  switch (settings.authMode) {
    case 'connection-string':
      service = BlobServiceClient.fromConnectionString(secret);
      break;
    case 'account-key':
      service = new BlobServiceClient(
        serviceUrl(settings),
        new StorageSharedKeyCredential(settings.accountName, secret)
      );
      break;
    case 'sas-token':
      service = new BlobServiceClient(`${serviceUrl(settings)}?${secret.replace(/^\?/, '')}`);
      break;
  }
  return service.getContainerClient(settings.containerName);
}

/**
 * Blob prefix from the settings joined with the resolved path, no leading
 * slash and a trailing one when non-empty
 */
export function searchPrefix(blobPrefix: string | undefined, path: string): string {
  const segments = [blobPrefix ?? '', path]
    .flatMap((part) => part.split('/'))
    .filter((segment) => segment.length > 0);
  return segments.length > 0 ? `${segments.join('/')}/` : '';
}

function blobUrl(containerUrl: string, blobName: string): string {
  const base = containerUrl.split('?')[0].replace(/\/+$/, '');
  const encoded = blobName
    .split('/')
    .map((segment) => encodeURIComponent(segment))
    .join('/');
  return `${base}/${encoded}`;
}

export class BlobStoreAdapter implements ProtocolAdapter<BlobStoreSettings> {
  readonly protocol = 'blob-store' as const;

  constructor(private readonly createContainer: BlobContainerFactory = createContainerClient) {}

  async list(request: ListRequest<BlobStoreSettings>): Promise<DiscoveredFile[]> {
    const { settings } = request;
    throwIfCancelled(request.signal);
    const container = this.open(settings, request.secret);
    const prefix = searchPrefix(settings.blobPrefix, request.path);
    const discoveredAt = new Date().toISOString();
    const files: DiscoveredFile[] = [];
    let scanned = 0;

    try {
      for await (const blob of container.listBlobsFlat({ prefix, abortSignal: request.signal })) {
        scanned++;
        const filename = blob.name.split('/').pop() ?? blob.name;
        if (!matchesName(filename, request.namePattern, request.extension)) continue;

        const metadata: Record<string, string> = { blobName: blob.name };
        if (blob.properties.etag) metadata.etag = blob.properties.etag;
        if (blob.properties.contentType) metadata.contentType = blob.properties.contentType;

        files.push({
          filename,
          locator: blobUrl(container.url, blob.name),
          sizeBytes: blob.properties.contentLength ?? null,
          lastModified: blob.properties.lastModified ? blob.properties.lastModified.toISOString() : null,
          discoveredAt,
          metadata,
        });
        // One extra match is enough to know the listing was truncated
        if (files.length > request.maxResults) break;
      }
    } catch (error) {
      throw this.classify(error, settings, request.signal);
    }

    logger.debug('Blob listing complete', {
      account: settings.accountName,
      container: settings.containerName,
      prefix,
      scanned,
      matched: files.length,
    }, 'BlobStoreAdapter');

    return limitResults(files, request.maxResults, 'BlobStoreAdapter');
  }

  async testConnection(settings: BlobStoreSettings, secret: string | undefined, signal: AbortSignal): Promise<void> {
    const container = this.open(settings, secret);
    let exists: boolean;
    try {
      exists = await container.exists({ abortSignal: signal });
    } catch (error) {
      throw this.classify(error, settings, signal);
    }
    if (!exists) {
      throw new RetrievalError(`Container ${settings.containerName} does not exist`, 'NotFound', {
        container: settings.containerName,
      });
    }
  }

  private open(settings: BlobStoreSettings, secret: string | undefined): BlobContainer {
    if (!secret) {
      throw new RetrievalError('Blob store credentials are missing', 'AuthenticationFailed', {
        account: settings.accountName,
      });
    }
    try {
      return this.createContainer(settings, secret);
    } catch (error) {
      // Malformed connection strings and keys surface here
      throw new RetrievalError(`Blob store credentials are invalid: ${errorMessage(error)}`, 'AuthenticationFailed', {
        account: settings.accountName,
      }, { cause: error });
    }
  }

  private classify(error: unknown, settings: BlobStoreSettings, signal: AbortSignal): RetrievalError {
    if (error instanceof RetrievalError) return error;
    const context = { account: settings.accountName, container: settings.containerName };

    if (signal.aborted) {
      return new RetrievalError('Blob listing was cancelled', 'Cancelled', context, { cause: error });
    }
    if (error instanceof RestError) {
      const status = error.statusCode ?? 0;
      if (status === 401 || status === 403) {
        return new RetrievalError(`Blob store rejected credentials: ${error.message}`, 'AuthenticationFailed', context, {
          cause: error,
        });
      }
      if (status === 404) {
        return new RetrievalError(`Container not found: ${error.message}`, 'NotFound', context, { cause: error });
      }
      if (status === 0 || status === 408 || status === 429 || status >= 500 || error.code === 'REQUEST_SEND_ERROR') {
        return new RetrievalError(`Blob store unavailable: ${error.message}`, 'NetworkError', context, {
          cause: error,
        });
      }
      return new RetrievalError(`Blob store error ${status}: ${error.message}`, 'ProtocolError', context, {
        cause: error,
      });
    }
    if (isTransientSystemError(error)) {
      return new RetrievalError(`Blob store connection failed: ${errorMessage(error)}`, 'NetworkError', context, {
        cause: error,
      });
    }
    return new RetrievalError(`Blob listing failed: ${errorMessage(error)}`, 'ProtocolError', context, {
      cause: error,
    });
  }
}
