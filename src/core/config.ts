import { z } from 'zod';
import { ConfigurationError } from './errors.js';

// Only the variables every run needs. JAMA_MOCK_MODE, the connection and the
// credential variables are read by the lifecycle manager, branch by branch.
const EnvSchema = z.object({
  JAMA_LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info')
});

export type JamaConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv): JamaConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n');
    throw new ConfigurationError(`Invalid configuration:\n${msg}`);
  }
  return parsed.data;
}

const JamaUrlSchema = z
  .string()
  .trim()
  .url()
  .refine((u) => /^https?:\/\//i.test(u), { message: 'must be an http(s) URL' })
  .transform((u) => u.replace(/\/+$/, ''));

/**
 * Read and validate `JAMA_URL`. Trailing slashes are dropped so paths can be appended.
 */
export function readJamaUrl(env: NodeJS.ProcessEnv): string {
  const raw = env.JAMA_URL;
  if (!raw || raw.trim() === '') {
    throw new ConfigurationError('JAMA_URL environment variable is required.');
  }
  const parsed = JamaUrlSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid JAMA_URL: ${parsed.error.issues[0]?.message ?? 'invalid URL'}`);
  }
  return parsed.data;
}
