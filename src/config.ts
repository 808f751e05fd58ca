import type { LevelWithSilent } from 'pino';

export interface AppConfig {
  logLevel: LevelWithSilent;
  prettyLogs: boolean;     // pino-pretty transport instead of JSON lines
  verifyTrees: boolean;    // structural check after every tree mutation
}

const LOG_LEVELS: readonly string[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.includes(value);
}

function isEnabled(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

/**
 * Reads configuration from the environment (populate it from .env with
 * dotenv before calling).
 *
 * LOG_LEVEL wins when it names a pino level; otherwise logs are quiet
 * ('warn') under HIDE_LOGS or in production and verbose ('debug') elsewhere.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const hideLogs = Boolean(env['HIDE_LOGS']);
  const production = env['NODE_ENV'] === 'production';
  const requested = env['LOG_LEVEL']?.toLowerCase();

  return {
    logLevel: requested !== undefined && isLogLevel(requested) ? requested : (hideLogs || production) ? 'warn' : 'debug',
    prettyLogs: env['NODE_ENV'] === 'development' && !hideLogs,
    verifyTrees: isEnabled(env['AVL_VERIFY']),
  };
}
