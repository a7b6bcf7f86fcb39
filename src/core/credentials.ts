import { z } from 'zod';
import type { Logger } from 'pino';
import {
  InvalidSecretFormatError,
  MissingCredentialsError,
  SecretsBackendAccessError,
  SecretsBackendUnavailableError
} from './errors.js';
import type { CredentialResolution, SecretFetcher } from './types.js';
import { createParameterStoreFetcher } from '../infra/parameterStore.js';

const SecretRecordSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1)
});

function nonEmpty(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

export interface ResolveCredentialsOptions {
  log: Logger;
  /** Parameter Store reader; defaults to the AWS SDK backed fetcher. */
  fetchSecret?: SecretFetcher;
}

/**
 * Resolve the Jama OAuth client credentials from the environment.
 *
 * Resolution order:
 * 1. `JAMA_CLIENT_ID` + `JAMA_CLIENT_SECRET`, when both are non-empty
 * 2. the JSON parameter named by `JAMA_AWS_SECRET_PATH` in AWS Parameter Store,
 *    read with the `JAMA_AWS_PROFILE` profile (default chain when unset)
 *
 * Nothing is retried. Secret values are never logged.
 *
 * @throws MissingCredentialsError when neither source is configured
 * @throws SecretsBackendUnavailableError when the SSM SDK is not installed
 * @throws SecretsBackendAccessError when the parameter cannot be fetched
 * @throws InvalidSecretFormatError when the parameter is not the expected JSON object
 */
export async function resolveCredentials(
  env: NodeJS.ProcessEnv,
  { log, fetchSecret }: ResolveCredentialsOptions
): Promise<CredentialResolution> {
  const clientId = nonEmpty(env.JAMA_CLIENT_ID);
  const clientSecret = nonEmpty(env.JAMA_CLIENT_SECRET);

  if (clientId && clientSecret) {
    log.info('Using JAMA_CLIENT_ID and JAMA_CLIENT_SECRET from environment variables');
    return { mode: 'direct', credentials: { clientId, clientSecret } };
  }
  log.info('Direct JAMA_CLIENT_ID/JAMA_CLIENT_SECRET not found or incomplete');

  const secretPath = nonEmpty(env.JAMA_AWS_SECRET_PATH);
  if (!secretPath) {
    log.error('No Jama OAuth credentials configured');
    throw new MissingCredentialsError();
  }

  log.info({ secretPath }, 'Fetching Jama credentials from AWS Parameter Store');
  const fetch = fetchSecret ?? createParameterStoreFetcher({ log });

  let raw: string;
  try {
    raw = await fetch(secretPath, nonEmpty(env.JAMA_AWS_PROFILE));
  } catch (err) {
    if (err instanceof SecretsBackendUnavailableError) {
      log.error({ code: err.code }, err.message);
      throw err;
    }
    log.error({ secretPath, err }, 'Parameter Store fetch failed');
    throw new SecretsBackendAccessError(secretPath, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new InvalidSecretFormatError(`Failed to parse JSON secret from AWS Parameter Store path '${secretPath}'`);
  }

  const parsed = SecretRecordSchema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidSecretFormatError(
      "AWS Parameter Store secret JSON must contain non-empty 'client_id' and 'client_secret' keys."
    );
  }

  log.info('Parsed client_id and client_secret from AWS Parameter Store secret');
  return {
    mode: 'secrets-manager',
    credentials: { clientId: parsed.data.client_id, clientSecret: parsed.data.client_secret }
  };
}
