/**
 * Resolved application settings
 *
 * Layers: defaults < YAML file < LDAPNAV_* env < command line.
 * Values out of range are replaced by their default and reported as
 * warnings, which the start view shows.
 */
import type { RetryPolicy } from '../lib/types';
import { ConfigParser } from '../lib/parseConfig';

import configArgs, { toConfig, type Config } from './args';
import { findConfigFile, loadConfigFile, configFileCandidates } from './file';

export const DEFAULT_PORT = 389;
export const DEFAULT_SSL_PORT = 636;

export interface Settings {
  host: string;
  port: number;
  baseDN: string;
  useSSL: boolean;
  useTLS: boolean;
  tlsVerify: boolean;
  bindUser: string;
  bindPassword: string;
  pageSize: number;
  retry: RetryPolicy;
  connectTimeoutMs: number;
  cacheMax: number;
  cacheTtl: number;
  autoConnect: boolean;
}

export interface ResolvedSettings {
  settings: Settings;
  warnings: string[];
}

export interface LoadedConfig {
  config: Config;
  configFile?: string;
  warnings: string[];
}

export const defaultPort = (useSSL: boolean): number =>
  useSSL ? DEFAULT_SSL_PORT : DEFAULT_PORT;

export function loadConfig(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): LoadedConfig {
  const parser = new ConfigParser(configArgs);
  const firstPass = toConfig(parser.parse(argv, {}, env));
  const path = findConfigFile(firstPass.config, configFileCandidates(undefined, env));
  if (!path) return { config: firstPass, warnings: [] };
  const file = loadConfigFile(path);
  return {
    config: toConfig(parser.parse(argv, file.values, env)),
    configFile: path,
    warnings: file.warnings,
  };
}

export function resolveSettings(config: Config): ResolvedSettings {
  const warnings: string[] = [];
  const repair = (
    name: string,
    value: number,
    valid: boolean,
    fallback: number
  ): number => {
    if (valid) return value;
    warnings.push(`${name}=${value} is out of range, using ${fallback}`);
    return fallback;
  };
  const integer = (value: number, min: number, max = Infinity): boolean =>
    Number.isInteger(value) && value >= min && value <= max;

  let useTLS = config.tls;
  if (config.ssl && config.tls) {
    warnings.push('SSL and StartTLS are exclusive, using SSL');
    useTLS = false;
  }

  const port =
    config.port === 0
      ? defaultPort(config.ssl)
      : repair('port', config.port, integer(config.port, 1, 65535), defaultPort(config.ssl));

  const initialDelayMs = repair(
    'retry_initial_delay_ms',
    config.retry_initial_delay_ms,
    integer(config.retry_initial_delay_ms, 0),
    500
  );
  let maxDelayMs = repair(
    'retry_max_delay_ms',
    config.retry_max_delay_ms,
    integer(config.retry_max_delay_ms, 0),
    5000
  );
  if (maxDelayMs < initialDelayMs) {
    warnings.push(
      `retry_max_delay_ms=${maxDelayMs} is below retry_initial_delay_ms, using ${initialDelayMs}`
    );
    maxDelayMs = initialDelayMs;
  }

  return {
    settings: {
      host: config.host.trim(),
      port,
      baseDN: config.base_dn.trim(),
      useSSL: config.ssl,
      useTLS,
      tlsVerify: !config.tls_skip_verify,
      bindUser: config.user,
      bindPassword: config.password,
      pageSize: repair(
        'page_size',
        config.page_size,
        integer(config.page_size, 1, 10000),
        50
      ),
      retry: {
        enabled: !config.no_retry,
        maxAttempts: repair(
          'retry_max_attempts',
          config.retry_max_attempts,
          integer(config.retry_max_attempts, 1, 100),
          3
        ),
        initialDelayMs,
        maxDelayMs,
      },
      connectTimeoutMs: repair(
        'connect_timeout_ms',
        config.connect_timeout_ms,
        integer(config.connect_timeout_ms, 1),
        5000
      ),
      cacheMax: repair('cache_max', config.cache_max, integer(config.cache_max, 1), 1000),
      cacheTtl: repair('cache_ttl', config.cache_ttl, integer(config.cache_ttl, 0), 30),
      autoConnect: config.connect,
    },
    warnings,
  };
}
