import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigSchema, ConfigError, type Config, type Protocol } from '@gitremap/shared';
import type { UriTarget } from '../rewrite/types';

/** Values given on the command line; a non-empty value wins over the file. */
export interface TargetOverrides {
  hostname?: string;
  protocol?: Protocol;
  username?: string;
}

export class ConfigLoader {
  static readFile(filePath: string): unknown {
    if (!fs.existsSync(filePath)) {
      throw new ConfigError(`Config file not found: ${filePath}`);
    }

    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf8');
    } catch (error: unknown) {
      throw new ConfigError(`Unable to read config file: ${filePath}`, { cause: error });
    }

    const ext = path.extname(filePath).toLowerCase();
    try {
      return ext === '.yaml' || ext === '.yml' ? yaml.load(content) : JSON.parse(content);
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException || error instanceof SyntaxError) {
        throw new ConfigError(`Error parsing config file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  static parse(raw: unknown, source = 'config'): Config {
    const result = ConfigSchema.safeParse(raw);

    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed (${source}):\n${issues}`, {
        details: { issues: result.error.issues.map((i) => ({ path: i.path, message: i.message })) },
      });
    }

    return result.data;
  }

  static load(configPath: string): Config {
    return this.parse(this.readFile(configPath), configPath);
  }

  /**
   * Merges command-line overrides into `replace` to get the URI target.
   * The hostname is required: there is no sensible default.
   */
  static resolveTarget(config: Config, overrides: TargetOverrides = {}): UriTarget {
    const hostname = overrides.hostname || config.replace.hostname;
    if (!hostname) {
      throw new ConfigError(
        'No hostname for the new URIs: set replace.hostname in the config or pass --hostname',
      );
    }

    const target: UriTarget = {
      protocol: overrides.protocol || config.replace.protocol,
      hostname,
    };
    const username = overrides.username || config.replace.username;
    if (username) {
      target.username = username;
    }
    return target;
  }
}
