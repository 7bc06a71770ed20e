import { ConfigError } from './backend/errors';
import { SizeUnits } from './backend/parser/SizeParser';
import { LogLevel } from './utils/OutputChannel';

/** Default desktop-like user-agent; some servers refuse bare clients. */
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 ' +
  '(KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export interface GlobalConfig {
  /** Request timeout in milliseconds. */
  timeout: number;
  userAgent: string;
  /** Parallel requests while walking or mirroring. */
  concurrency: number;
  sizeUnits: SizeUnits;
  logLevel: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const SIZE_UNITS: readonly SizeUnits[] = ['binary', 'decimal'];

/**
 * Reads `AUTOINDEX_*` variables, falling back to defaults for unset ones.
 *
 * @throws ConfigError for values that are set but invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GlobalConfig {
  return {
    timeout: positiveInt(env, 'AUTOINDEX_TIMEOUT', 30) * 1000,
    userAgent: env.AUTOINDEX_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
    concurrency: positiveInt(env, 'AUTOINDEX_CONCURRENCY', 4),
    sizeUnits: oneOf(env, 'AUTOINDEX_SIZE_UNITS', SIZE_UNITS, 'binary'),
    logLevel: oneOf(env, 'AUTOINDEX_LOG_LEVEL', LOG_LEVELS, 'info'),
  };
}

function positiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) {return fallback;}
  if (!/^\d+$/.test(raw) || Number(raw) === 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
  }
  return Number(raw);
}

function oneOf<T extends string>(
  env: NodeJS.ProcessEnv,
  key: string,
  allowed: readonly T[],
  fallback: T,
): T {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) {return fallback;}
  const value = allowed.find((candidate) => candidate === raw);
  if (!value) {
    throw new ConfigError(`${key} must be one of ${allowed.join(', ')}, got "${raw}"`);
  }
  return value;
}
