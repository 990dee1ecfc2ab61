/**
 * YAML configuration file
 *
 * ldap:
 *   host: ldap.example.com
 *   port: 636
 *   base_dn: dc=example,dc=com
 *   use_ssl: true
 * pagination:
 *   page_size: 100
 * retry:
 *   enabled: true
 *   max_attempts: 5
 */
import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import YAML from 'yaml';

import { ConfigError, errorMessage } from '../lib/errors';
import type { ConfigValues } from '../lib/parseConfig';

// section -> file key -> config key
const fileKeys: Record<string, Record<string, string>> = {
  ldap: {
    host: 'host',
    port: 'port',
    base_dn: 'base_dn',
    use_ssl: 'ssl',
    use_tls: 'tls',
    tls_skip_verify: 'tls_skip_verify',
    bind_user: 'user',
    bind_pass: 'password',
  },
  pagination: {
    page_size: 'page_size',
  },
  retry: {
    enabled: 'no_retry',
    max_attempts: 'retry_max_attempts',
    initial_delay_ms: 'retry_initial_delay_ms',
    max_delay_ms: 'retry_max_delay_ms',
    connect_timeout_ms: 'connect_timeout_ms',
  },
};

export interface ConfigFile {
  path: string;
  values: ConfigValues;
  warnings: string[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export function configFileCandidates(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): string[] {
  const xdg = env.XDG_CONFIG_HOME || join(home, '.config');
  return [
    join(cwd, 'ldapnav.yaml'),
    join(cwd, 'config.yaml'),
    join(xdg, 'ldapnav', 'config.yaml'),
    join(home, '.ldapnav.yaml'),
    '/etc/ldapnav/config.yaml',
  ];
}

/**
 * An explicit path must exist; otherwise the first existing candidate wins
 */
export function findConfigFile(
  explicit: string,
  candidates: string[] = configFileCandidates(),
  exists: (path: string) => boolean = existsSync
): string | undefined {
  if (explicit) {
    if (!exists(explicit)) {
      throw new ConfigError(`Configuration file not found: ${explicit}`);
    }
    return explicit;
  }
  return candidates.find(path => exists(path));
}

export function parseConfigFile(text: string, source: string): ConfigFile {
  let doc: unknown;
  try {
    doc = YAML.parse(text);
  } catch (err) {
    throw new ConfigError(`${source}: ${errorMessage(err)}`);
  }
  const result: ConfigFile = { path: source, values: {}, warnings: [] };
  if (doc === null || doc === undefined) return result;
  if (!isRecord(doc)) {
    throw new ConfigError(`${source}: top level must be a mapping`);
  }

  for (const [section, content] of Object.entries(doc)) {
    const keys = Object.hasOwn(fileKeys, section) ? fileKeys[section] : undefined;
    if (!keys) {
      result.warnings.push(`${source}: unknown section "${section}" ignored`);
      continue;
    }
    if (content === null) continue;
    if (!isRecord(content)) {
      throw new ConfigError(`${source}: ${section} must be a mapping`);
    }
    for (const [name, value] of Object.entries(content)) {
      const key = Object.hasOwn(keys, name) ? keys[name] : undefined;
      if (!key) {
        result.warnings.push(
          `${source}: unknown key "${section}.${name}" ignored`
        );
        continue;
      }
      if (value === null) continue;
      if (
        typeof value !== 'string' &&
        typeof value !== 'number' &&
        typeof value !== 'boolean'
      ) {
        throw new ConfigError(`${source}: ${section}.${name} must be a scalar`);
      }
      if (section === 'retry' && name === 'enabled') {
        if (typeof value !== 'boolean') {
          throw new ConfigError(`${source}: retry.enabled must be a boolean`);
        }
        result.values[key] = !value;
      } else {
        result.values[key] = value;
      }
    }
  }
  return result;
}

export function loadConfigFile(path: string): ConfigFile {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    throw new ConfigError(`Unable to read ${path}: ${errorMessage(err)}`);
  }
  return parseConfigFile(text, path);
}
