import { RetrievalError } from './errors.js';
import { ProtocolSettings } from './types.js';

/**
 * Turns an opaque credential handle into the secret it names.
 * Implementations must not cache beyond a single execution.
 */
export interface CredentialResolver {
  resolve(handle: string): Promise<string>;
}

/**
 * Reads secrets from environment variables (populated from `.env` by dotenv
 * in the entry points). Handle `ftp/partner-a` with prefix `RETRIEVAL_SECRET_`
 * reads `RETRIEVAL_SECRET_FTP_PARTNER_A`.
 */
export class EnvCredentialResolver implements CredentialResolver {
  constructor(
    private readonly prefix: string = 'RETRIEVAL_SECRET_',
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  variableFor(handle: string): string {
    return `${this.prefix}${handle.trim().replace(/[^A-Za-z0-9]+/g, '_').toUpperCase()}`;
  }

  async resolve(handle: string): Promise<string> {
    const variable = this.variableFor(handle);
    const value = this.env[variable];
    if (value === undefined || value.length === 0) {
      throw new RetrievalError(`Credential handle "${handle}" could not be resolved`, 'AuthenticationFailed', {
        handle,
      });
    }
    return value;
  }
}

/**
 * Handle a configuration's settings refer to, if any
 */
export function credentialHandle(settings: ProtocolSettings): string | undefined {
  switch (settings.protocol) {
    case 'file-transfer':
      return settings.passwordHandle;
    case 'web':
      return settings.authMode === 'none' ? undefined : settings.secretHandle;
    case 'blob-store':
      return settings.secretHandle;
  }
}

export async function resolveSecret(
  resolver: CredentialResolver,
  settings: ProtocolSettings
): Promise<string | undefined> {
  const handle = credentialHandle(settings);
  if (!handle) return undefined;
  try {
    return await resolver.resolve(handle);
  } catch (error) {
    if (error instanceof RetrievalError) throw error;
    throw new RetrievalError(`Credential handle "${handle}" could not be resolved`, 'AuthenticationFailed', { handle }, {
      cause: error,
    });
  }
}
