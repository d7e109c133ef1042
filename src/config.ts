/**
 * Client configuration
 *
 * Settings come from a `.hscfg` file (`key = value` lines, `#` comments),
 * then from upper-cased environment variables (`HS_ENDPOINT` overrides
 * `hs_endpoint`), then from explicit overrides.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

export const CONFIG_FILE_NAME = '.hscfg';

const STANDARD_KEYS = ['hs_endpoint', 'hs_username', 'hs_password', 'hs_api_key', 'hs_bucket'] as const;

export interface HsConfig {
  readonly hs_endpoint: string;
  readonly hs_username: string;
  readonly hs_password: string;
  readonly hs_api_key: string;
  readonly hs_bucket: string;
  readonly [key: string]: string;
}

export interface LoadConfigOptions {
  /** Config file to read instead of `./.hscfg` or `~/.hscfg` */
  configFile?: string;
  /** Environment to read overrides from; defaults to `process.env` */
  env?: Record<string, string | undefined>;
  cwd?: string;
  homeDir?: string;
}

/**
 * Parse the text of a config file. Lines without `=` are reported and
 * skipped.
 */
export function parseConfigText(text: string, source = CONFIG_FILE_NAME): Record<string, string> {
  const values: Record<string, string> = {};
  text.split(/\r?\n/).forEach((line, i) => {
    const s = line.trim();
    if (!s || s.startsWith('#')) return;
    const eq = s.indexOf('=');
    if (eq === -1) {
      console.warn(`config file: ${source} line: ${i + 1} is not valid`);
      return;
    }
    values[s.slice(0, eq).trim()] = s.slice(eq + 1).trim();
  });
  return values;
}

function findConfigFile(options: LoadConfigOptions): string | undefined {
  if (options.configFile) {
    return options.configFile;
  }
  const local = join(options.cwd ?? process.cwd(), CONFIG_FILE_NAME);
  if (existsSync(local)) {
    return local;
  }
  return join(options.homeDir ?? homedir(), CONFIG_FILE_NAME);
}

export function loadConfig(
  overrides: Record<string, string> = {},
  options: LoadConfigOptions = {}
): HsConfig {
  const { env = process.env } = options;
  const values: Record<string, string> = {};

  const file = findConfigFile(options);
  if (file !== undefined && existsSync(file)) {
    Object.assign(values, parseConfigText(readFileSync(file, 'utf8'), file));
  }

  for (const key of STANDARD_KEYS) {
    if (!(key in values)) values[key] = '';
  }

  for (const key of Object.keys(values)) {
    const fromEnv = env[key.toUpperCase()];
    if (fromEnv !== undefined) values[key] = fromEnv;
  }

  Object.assign(values, overrides);

  return Object.freeze({
    ...values,
    hs_endpoint: values.hs_endpoint,
    hs_username: values.hs_username,
    hs_password: values.hs_password,
    hs_api_key: values.hs_api_key,
    hs_bucket: values.hs_bucket,
  });
}
