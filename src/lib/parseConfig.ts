/**
 * Configuration parser
 * Order: default < config file < env < cli
 */
import { ConfigError } from './errors';

export type ConfigValue = string | number | boolean;
export type ConfigType = 'string' | 'number' | 'boolean';
export type ConfigValues = Record<string, ConfigValue>;

export type ConfigEntry = [
  string, // arg
  string, // env value
  ConfigValue, // default value
  ConfigType?, // type, taken from the default value when omitted
];

export type ConfigTemplate = ConfigEntry[];

export function entryType(entry: ConfigEntry): ConfigType {
  if (entry[3]) return entry[3];
  switch (typeof entry[2]) {
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    default:
      return 'string';
  }
}

function toNumber(raw: string, source: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigError(`${source}: "${raw}" is not a number`);
  }
  return value;
}

function toBoolean(raw: string, source: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
    case 'on':
      return true;
    case 'false':
    case '0':
    case 'no':
    case 'off':
    case '':
      return false;
    default:
      throw new ConfigError(`${source}: "${raw}" is not a boolean`);
  }
}

export class ConfigParser {
  private config: ConfigTemplate;

  constructor(config: ConfigTemplate) {
    this.config = config;
  }

  /**
   * @param overrides - values read from a configuration file, keyed like the result
   */
  parse(
    argv: string[] = process.argv,
    overrides: ConfigValues = {},
    env: NodeJS.ProcessEnv = process.env
  ): ConfigValues {
    const result: ConfigValues = {};
    const cliArgs = this.parseCliArgs(argv);
    for (const entry of this.config) {
      const key = this.getKeyFromCliArg(entry[0]);
      const type = entryType(entry);
      let value: ConfigValue = entry[2];

      // Override with config file value if exists
      if (key in overrides) {
        const fileValue = overrides[key];
        if (typeof fileValue !== type) {
          throw new ConfigError(
            `Configuration file: ${key} must be a ${type}, got ${typeof fileValue}`
          );
        }
        value = fileValue;
      }

      // Override with env value if exists
      const envValue = env[entry[1]];
      if (envValue !== undefined) {
        if (type === 'boolean') {
          value = toBoolean(envValue, entry[1]);
        } else if (type === 'number') {
          value = toNumber(envValue, entry[1]);
        } else {
          value = envValue;
        }
      }

      // Override with CLI arg if exists
      const cliValue = cliArgs.get(entry[0]);
      if (cliValue !== undefined) {
        value =
          type === 'number' && typeof cliValue === 'string'
            ? toNumber(cliValue, entry[0])
            : cliValue;
        cliArgs.delete(entry[0]);
      }

      result[key] = value;
    }
    return result;
  }

  // Command-line parser
  private parseCliArgs(argv: string[]): Map<string, ConfigValue> {
    const args = new Map<string, ConfigValue>();

    for (let i = 2; i < argv.length; i++) {
      const arg = argv[i];
      if (!arg.startsWith('-')) continue;

      const eq = arg.indexOf('=');
      const name = eq > 0 ? arg.slice(0, eq) : arg;
      const inline = eq > 0 ? arg.slice(eq + 1) : undefined;
      const configEntry = this.config.find(entry => entry[0] === name);
      if (!configEntry) throw new ConfigError(`Unknown option ${name}`);

      if (entryType(configEntry) === 'boolean') {
        args.set(name, inline === undefined ? true : toBoolean(inline, name));
      } else if (inline !== undefined) {
        args.set(name, inline);
      } else {
        const nextArg = argv[i + 1];
        if (nextArg === undefined) {
          throw new ConfigError(`Missing value for ${name}`);
        }
        args.set(name, nextArg);
        i++;
      }
    }

    return args;
  }

  private getKeyFromCliArg(cliArg: string): string {
    if (cliArg.startsWith('--')) {
      return cliArg.substring(2).replace(/-/g, '_');
    } else if (cliArg.startsWith('-')) {
      return cliArg.substring(1).replace(/-/g, '_');
    }
    return cliArg;
  }
}
