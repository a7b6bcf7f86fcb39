import pino from 'pino';
import type { JamaConfig } from './config.js';

// stdout carries the MCP stream, so logs go to stderr.
export function createLogger(cfg: Pick<JamaConfig, 'JAMA_LOG_LEVEL'>) {
  return pino(
    {
      level: cfg.JAMA_LOG_LEVEL,
      redact: {
        paths: ['clientSecret', 'client_secret', 'credentials.clientSecret', 'headers.authorization'],
        remove: true
      }
    },
    pino.destination(2)
  );
}
