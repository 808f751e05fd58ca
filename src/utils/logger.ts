import pino, { type Logger } from 'pino';
import type { AppConfig } from '../config.js';

/**
 * Builds the pino logger handed to trees and the CLI. Logs go to stderr so
 * they never mix with data written to stdout.
 */
export function createLogger(config: Pick<AppConfig, 'logLevel' | 'prettyLogs'>, name = 'avl-links'): Logger {
  if (config.prettyLogs) {
    return pino({
      name,
      level: config.logLevel,
      transport: { target: 'pino-pretty', options: { destination: 2 } },
    });
  }
  return pino({ name, level: config.logLevel }, pino.destination(2));
}
