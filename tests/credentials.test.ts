import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import { resolveCredentials } from '../src/core/credentials.js';
import {
  InvalidSecretFormatError,
  MissingCredentialsError,
  SecretsBackendAccessError,
  SecretsBackendUnavailableError,
  isCredentialsError
} from '../src/core/errors.js';

const log = pino({ level: 'silent' });

function secretFetcher(value: string) {
  return vi.fn(async (_path: string, _profile?: string) => value);
}

describe('resolveCredentials', () => {
  describe('direct environment variables', () => {
    it('returns the direct pair without touching the secrets backend', async () => {
      const fetchSecret = secretFetcher('{"client_id":"c","client_secret":"d"}');

      const result = await resolveCredentials(
        { JAMA_CLIENT_ID: 'a', JAMA_CLIENT_SECRET: 'b', JAMA_AWS_SECRET_PATH: '/jama/creds' },
        { log, fetchSecret }
      );

      expect(result).toEqual({ mode: 'direct', credentials: { clientId: 'a', clientSecret: 'b' } });
      expect(fetchSecret).not.toHaveBeenCalled();
    });

    it('treats an empty secret as absent and falls back', async () => {
      const fetchSecret = secretFetcher('{"client_id":"c","client_secret":"d"}');

      const result = await resolveCredentials(
        { JAMA_CLIENT_ID: 'a', JAMA_CLIENT_SECRET: '', JAMA_AWS_SECRET_PATH: '/jama/creds' },
        { log, fetchSecret }
      );

      expect(result).toEqual({ mode: 'secrets-manager', credentials: { clientId: 'c', clientSecret: 'd' } });
    });
  });

  describe('Parameter Store fallback', () => {
    it('fetches the secret exactly once with the configured profile', async () => {
      const fetchSecret = secretFetcher('{"client_id":"c","client_secret":"d"}');

      await resolveCredentials(
        { JAMA_CLIENT_ID: 'a', JAMA_AWS_SECRET_PATH: '/jama/creds', JAMA_AWS_PROFILE: 'prod' },
        { log, fetchSecret }
      );

      expect(fetchSecret).toHaveBeenCalledTimes(1);
      expect(fetchSecret).toHaveBeenCalledWith('/jama/creds', 'prod');
    });

    it('uses the default profile when JAMA_AWS_PROFILE is unset or empty', async () => {
      const fetchSecret = secretFetcher('{"client_id":"c","client_secret":"d"}');

      await resolveCredentials({ JAMA_AWS_SECRET_PATH: '/x', JAMA_AWS_PROFILE: '' }, { log, fetchSecret });

      expect(fetchSecret).toHaveBeenCalledWith('/x', undefined);
    });

    it('ignores extra keys in the secret', async () => {
      const fetchSecret = secretFetcher('{"client_id":"c","client_secret":"d","owner":"qa"}');

      const result = await resolveCredentials({ JAMA_AWS_SECRET_PATH: '/x' }, { log, fetchSecret });

      expect(result.credentials).toEqual({ clientId: 'c', clientSecret: 'd' });
    });

    it('rejects a secret without client_secret as an invalid format', async () => {
      const fetchSecret = secretFetcher('{"client_id":"c"}');

      const err = await resolveCredentials({ JAMA_AWS_SECRET_PATH: '/x' }, { log, fetchSecret }).catch(
        (e: unknown) => e
      );

      expect(err).toBeInstanceOf(InvalidSecretFormatError);
      expect(err).toMatchObject({ code: 'INVALID_SECRET_FORMAT' });
    });

    it('rejects empty credential fields as an invalid format', async () => {
      const fetchSecret = secretFetcher('{"client_id":"","client_secret":"d"}');

      await expect(resolveCredentials({ JAMA_AWS_SECRET_PATH: '/x' }, { log, fetchSecret })).rejects.toBeInstanceOf(
        InvalidSecretFormatError
      );
    });

    it('rejects a value that is not JSON', async () => {
      const fetchSecret = secretFetcher('client_id=c');

      await expect(resolveCredentials({ JAMA_AWS_SECRET_PATH: '/x' }, { log, fetchSecret })).rejects.toThrow(
        "Failed to parse JSON secret from AWS Parameter Store path '/x'"
      );
    });

    it('rejects JSON that is not an object', async () => {
      const fetchSecret = secretFetcher('null');

      await expect(resolveCredentials({ JAMA_AWS_SECRET_PATH: '/x' }, { log, fetchSecret })).rejects.toBeInstanceOf(
        InvalidSecretFormatError
      );
    });

    it('wraps fetch failures in an access error naming only the path', async () => {
      const cause = new Error('AccessDeniedException');
      const fetchSecret = vi.fn(async (_path: string, _profile?: string): Promise<string> => {
        throw cause;
      });

      const err = await resolveCredentials({ JAMA_AWS_SECRET_PATH: '/jama/creds' }, { log, fetchSecret }).catch(
        (e: unknown) => e
      );

      expect(err).toBeInstanceOf(SecretsBackendAccessError);
      expect(err).toMatchObject({
        code: 'SECRETS_BACKEND_ACCESS',
        secretPath: '/jama/creds',
        message: "Failed to retrieve secret from AWS Parameter Store path '/jama/creds'",
        cause
      });
    });

    it('passes an unavailable SDK through unchanged', async () => {
      const unavailable = new SecretsBackendUnavailableError('@aws-sdk/client-ssm');
      const fetchSecret = vi.fn(async (_path: string, _profile?: string): Promise<string> => {
        throw unavailable;
      });

      await expect(resolveCredentials({ JAMA_AWS_SECRET_PATH: '/x' }, { log, fetchSecret })).rejects.toBe(
        unavailable
      );
    });
  });

  describe('no credential source', () => {
    it('fails with MissingCredentials and makes no call', async () => {
      const fetchSecret = secretFetcher('{}');

      const err = await resolveCredentials({ JAMA_CLIENT_ID: 'a' }, { log, fetchSecret }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(MissingCredentialsError);
      expect(isCredentialsError(err)).toBe(true);
      expect(err).toMatchObject({ code: 'MISSING_CREDENTIALS' });
      expect(fetchSecret).not.toHaveBeenCalled();
    });

    it('names both configuration paths in the message', async () => {
      await expect(resolveCredentials({}, { log })).rejects.toThrow(
        'Missing Jama OAuth credentials. Set JAMA_CLIENT_ID and JAMA_CLIENT_SECRET, ' +
          'or configure the AWS Parameter Store fallback with JAMA_AWS_SECRET_PATH.'
      );
    });
  });
});
