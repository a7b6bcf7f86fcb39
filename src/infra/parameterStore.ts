import type { Logger } from 'pino';
import { SecretsBackendUnavailableError } from '../core/errors.js';
import type { SecretFetcher } from '../core/types.js';

export const SSM_PACKAGE = '@aws-sdk/client-ssm';

export interface ParameterStore {
  /** Resolves to the decrypted value, or undefined when the parameter has none. */
  getParameter(name: string): Promise<string | undefined>;
  /** Tears down the underlying SDK client. */
  close(): void;
}

export type ParameterStoreOpener = (profile?: string) => Promise<ParameterStore>;

/**
 * Open an SSM client for the given profile (the default credential chain when unset).
 *
 * The SDK is an optional dependency, so it is loaded on demand: runs that never
 * reach the Parameter Store fallback do not need it installed.
 */
export const openParameterStore: ParameterStoreOpener = async (profile) => {
  let ssm: typeof import('@aws-sdk/client-ssm');
  try {
    ssm = await import('@aws-sdk/client-ssm');
  } catch (err) {
    throw new SecretsBackendUnavailableError(SSM_PACKAGE, { cause: err });
  }

  const client = new ssm.SSMClient(profile ? { profile } : {});
  return {
    async getParameter(name) {
      const out = await client.send(new ssm.GetParameterCommand({ Name: name, WithDecryption: true }));
      return out.Parameter?.Value;
    },
    close() {
      client.destroy();
    }
  };
};

/**
 * Build the {@link SecretFetcher} used by the credential resolver's fallback path.
 *
 * Each call opens its own store and closes it once the value is read.
 */
export function createParameterStoreFetcher({
  log,
  open = openParameterStore
}: {
  log: Logger;
  open?: ParameterStoreOpener;
}): SecretFetcher {
  return async (path, profile) => {
    const store = await open(profile).catch((err: unknown) => {
      if (err instanceof SecretsBackendUnavailableError) log.debug({ err: err.cause }, 'SSM SDK failed to load');
      throw err;
    });
    log.info({ profile: profile ?? 'default' }, 'Using AWS profile for Parameter Store');

    try {
      const value = await store.getParameter(path);
      if (value === undefined || value === '') {
        throw new Error(`Parameter '${path}' has no value`);
      }
      return value;
    } finally {
      store.close();
    }
  };
}
