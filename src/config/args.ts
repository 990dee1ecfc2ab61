/**
 * command-line options, corresponding environment variables, default values and types
 * Contains also the typescript declaration of config
 */
import type { ConfigTemplate, ConfigValues } from '../lib/parseConfig';
import { ConfigError } from '../lib/errors';

export type LogLevel = 'error' | 'warn' | 'notice' | 'info' | 'debug';

/**
 * Typescript declaration of config
 *
 * See below for config arguments, corresponding environment variables,
 * default value and type
 */
export interface Config {
  config: string;
  // LDAP
  host: string;
  // 0: 389, or 636 with --ssl
  port: number;
  base_dn: string;
  ssl: boolean;
  tls: boolean;
  tls_skip_verify: boolean;
  user: string;
  password: string;
  page_size: number;

  // Retry policy
  no_retry: boolean;
  retry_max_attempts: number;
  retry_initial_delay_ms: number;
  retry_max_delay_ms: number;
  connect_timeout_ms: number;

  // Entry cache
  cache_max: number;
  cache_ttl: number;

  // Logs
  log_level: LogLevel;
  logger: 'file' | 'console';
  log_file: string;

  connect: boolean;
  help: boolean;
}

const configArgs: ConfigTemplate = [
  ['--config', 'LDAPNAV_CONFIG', ''],

  // LDAP
  ['--host', 'LDAPNAV_HOST', 'localhost'],
  ['--port', 'LDAPNAV_PORT', 0, 'number'],
  ['--base-dn', 'LDAPNAV_BASE_DN', 'dc=example,dc=com'],
  ['--ssl', 'LDAPNAV_SSL', false, 'boolean'],
  ['--tls', 'LDAPNAV_TLS', false, 'boolean'],
  ['--tls-skip-verify', 'LDAPNAV_TLS_SKIP_VERIFY', false, 'boolean'],
  ['--user', 'LDAPNAV_USER', ''],
  ['--password', 'LDAPNAV_PASSWORD', ''],
  ['--page-size', 'LDAPNAV_PAGE_SIZE', 50, 'number'],

  // Retry policy
  ['--no-retry', 'LDAPNAV_NO_RETRY', false, 'boolean'],
  ['--retry-max-attempts', 'LDAPNAV_RETRY_MAX_ATTEMPTS', 3, 'number'],
  ['--retry-initial-delay-ms', 'LDAPNAV_RETRY_INITIAL_DELAY_MS', 500, 'number'],
  ['--retry-max-delay-ms', 'LDAPNAV_RETRY_MAX_DELAY_MS', 5000, 'number'],
  ['--connect-timeout-ms', 'LDAPNAV_CONNECT_TIMEOUT_MS', 5000, 'number'],

  // Entry cache (ttl in seconds)
  ['--cache-max', 'LDAPNAV_CACHE_MAX', 1000, 'number'],
  ['--cache-ttl', 'LDAPNAV_CACHE_TTL', 30, 'number'],

  // Logs
  ['--log-level', 'LDAPNAV_LOG_LEVEL', 'info'],
  ['--logger', 'LDAPNAV_LOGGER', 'file'],
  ['--log-file', 'LDAPNAV_LOG_FILE', 'ldapnav.log'],

  ['--connect', 'LDAPNAV_CONNECT', false, 'boolean'],
  ['--help', 'LDAPNAV_HELP', false, 'boolean'],
];

const logLevels: LogLevel[] = ['error', 'warn', 'notice', 'info', 'debug'];

const isLogLevel = (value: string): value is LogLevel =>
  logLevels.some(level => level === value);

function readString(values: ConfigValues, key: string): string {
  const value = values[key];
  if (typeof value !== 'string') throw new ConfigError(`${key} must be a string`);
  return value;
}

function readNumber(values: ConfigValues, key: string): number {
  const value = values[key];
  if (typeof value !== 'number') throw new ConfigError(`${key} must be a number`);
  return value;
}

function readBoolean(values: ConfigValues, key: string): boolean {
  const value = values[key];
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${key} must be a boolean`);
  }
  return value;
}

/**
 * Typed view of parsed values
 */
export function toConfig(values: ConfigValues): Config {
  const logLevel = readString(values, 'log_level');
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(
      `log_level must be one of ${logLevels.join(', ')}, got "${logLevel}"`
    );
  }
  const logger = readString(values, 'logger');
  if (logger !== 'file' && logger !== 'console') {
    throw new ConfigError(`logger must be "file" or "console", got "${logger}"`);
  }
  return {
    config: readString(values, 'config'),
    host: readString(values, 'host'),
    port: readNumber(values, 'port'),
    base_dn: readString(values, 'base_dn'),
    ssl: readBoolean(values, 'ssl'),
    tls: readBoolean(values, 'tls'),
    tls_skip_verify: readBoolean(values, 'tls_skip_verify'),
    user: readString(values, 'user'),
    password: readString(values, 'password'),
    page_size: readNumber(values, 'page_size'),
    no_retry: readBoolean(values, 'no_retry'),
    retry_max_attempts: readNumber(values, 'retry_max_attempts'),
    retry_initial_delay_ms: readNumber(values, 'retry_initial_delay_ms'),
    retry_max_delay_ms: readNumber(values, 'retry_max_delay_ms'),
    connect_timeout_ms: readNumber(values, 'connect_timeout_ms'),
    cache_max: readNumber(values, 'cache_max'),
    cache_ttl: readNumber(values, 'cache_ttl'),
    log_level: logLevel,
    logger,
    log_file: readString(values, 'log_file'),
    connect: readBoolean(values, 'connect'),
    help: readBoolean(values, 'help'),
  };
}

export default configArgs;
