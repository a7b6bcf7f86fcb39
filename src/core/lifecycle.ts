import type { Logger } from 'pino';
import { readJamaUrl } from './config.js';
import { resolveCredentials } from './credentials.js';
import { JAMA_CLIENT } from './types.js';
import type { CredentialPair, JamaClient, LifespanContext, ResolutionMode, SecretFetcher } from './types.js';
import { MockJamaClient } from '../infra/mockClient.js';
import { JamaRestClient } from '../infra/jamaRestClient.js';

export interface AcquireOptions {
  log: Logger;
  /** Overrides the credential resolver (tests). */
  resolve?: typeof resolveCredentials;
  /** Parameter Store reader handed to the resolver. */
  fetchSecret?: SecretFetcher;
  /** Builds the real client; defaults to {@link JamaRestClient}. */
  createClient?: (baseUrl: string, credentials: CredentialPair, log: Logger) => JamaClient;
}

/**
 * The one client handle of a server run, plus the means to give it back.
 */
export interface ClientLease {
  readonly mode: ResolutionMode;
  readonly context: LifespanContext;
  readonly released: boolean;
  release(): void;
}

export function isMockMode(env: NodeJS.ProcessEnv): boolean {
  return (env.JAMA_MOCK_MODE ?? '').trim().toLowerCase() === 'true';
}

function defaultCreateClient(baseUrl: string, credentials: CredentialPair, log: Logger): JamaClient {
  return new JamaRestClient({ baseUrl, credentials, log });
}

function lease(mode: ResolutionMode, client: JamaClient, log: Logger): ClientLease {
  const context: LifespanContext = Object.freeze({ [JAMA_CLIENT]: client });
  let released = false;

  return {
    mode,
    context,
    get released() {
      return released;
    },
    release() {
      if (released) return;
      released = true;
      // The REST client keeps no connection open, so there is nothing to drain.
      log.info({ mode }, 'Jama client released');
    }
  };
}

/**
 * Build the shared Jama client for this process.
 *
 * Mock mode (`JAMA_MOCK_MODE=true`) reads no other variable. Real mode needs
 * `JAMA_URL` before it resolves credentials, and builds an OAuth client from
 * the resolved pair. No request is sent here: a bad URL or rejected
 * credentials surface on the first tool call.
 *
 * @throws ConfigurationError when `JAMA_URL` is missing or invalid in real mode
 * @throws CredentialsError subclasses from {@link resolveCredentials}, unchanged
 */
export async function acquireJamaClient(env: NodeJS.ProcessEnv, opts: AcquireOptions): Promise<ClientLease> {
  const { log } = opts;

  if (isMockMode(env)) {
    log.info('JAMA_MOCK_MODE enabled, skipping authentication');
    const client = new MockJamaClient(log.child({ component: 'mock-client' }));
    return lease('mock', client, log);
  }

  let baseUrl: string;
  try {
    baseUrl = readJamaUrl(env);
  } catch (err) {
    log.error({ err }, 'Cannot connect to Jama without a valid JAMA_URL');
    throw err;
  }

  log.info('Resolving Jama credentials');
  const resolve = opts.resolve ?? resolveCredentials;
  const { mode, credentials } = await resolve(env, { log, fetchSecret: opts.fetchSecret });

  const createClient = opts.createClient ?? defaultCreateClient;
  const client = createClient(baseUrl, credentials, log.child({ component: 'jama-client' }));
  log.info({ baseUrl, mode }, 'Configured Jama client for OAuth');

  return lease(mode, client, log);
}

/**
 * Run `fn` with the process's client lease, releasing it however `fn` exits.
 */
export async function withJamaClient<T>(
  env: NodeJS.ProcessEnv,
  opts: AcquireOptions,
  fn: (lease: ClientLease) => Promise<T>
): Promise<T> {
  const held = await acquireJamaClient(env, opts);
  try {
    return await fn(held);
  } finally {
    held.release();
  }
}
