import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { ConfigError, errorMessage } from '../errors/custom-errors.js';
import { deepMerge, isPlainObject, type PlainObject } from '../utils/deep-merge.js';
import { resolveEnvRecursive } from '../utils/env-resolver.js';
import { type Config, validateConfigSafe } from './config-schema.js';

/**
 * Default config file path
 */
export const DEFAULT_CONFIG_PATH = './recfetch.yaml';

/**
 * Environment variables that take precedence over the file
 */
const ENV_OVERRIDES: ReadonlyArray<{ variable: string; key: string; section?: string }> = [
  { variable: 'RECFETCH_EMAIL', section: 'credentials', key: 'email' },
  { variable: 'RECFETCH_PASSWORD', section: 'credentials', key: 'password' },
  { variable: 'RECFETCH_BASE_URL', key: 'baseUrl' },
  { variable: 'RECFETCH_OUTPUT_DIR', key: 'outputDirectory' },
];

export function envOverrides(env: NodeJS.ProcessEnv = process.env): PlainObject {
  let overrides: PlainObject = {};
  for (const { variable, key, section } of ENV_OVERRIDES) {
    const value = env[variable];
    if (!value) continue;

    overrides = deepMerge(overrides, section ? { [section]: { [key]: value } } : { [key]: value });
  }
  return overrides;
}

async function readConfigFile(absolutePath: string, required: boolean): Promise<string | null> {
  try {
    return await readFile(absolutePath, 'utf-8');
  } catch (error) {
    if (!required && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw new ConfigError(`Cannot read configuration file "${absolutePath}": ${errorMessage(error)}`);
  }
}

/**
 * Parse YAML content into a plain object (an empty document is an empty config)
 */
export function parseConfigYaml(content: string): PlainObject {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse YAML: ${errorMessage(error)}`);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError('Configuration must be a YAML mapping');
  }
  return parsed;
}

/**
 * Load configuration from a YAML file.
 *
 * Without `configPath` the default file is read when it exists; a path given
 * explicitly must exist. `${VAR}` placeholders are resolved, then the
 * `RECFETCH_*` environment variables are applied on top.
 *
 * @throws ConfigError if the file is unreadable or invalid
 */
export async function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): Promise<Config> {
  const absolutePath = resolve(configPath ?? DEFAULT_CONFIG_PATH);
  const content = await readConfigFile(absolutePath, configPath !== undefined);

  const raw = content === null ? {} : parseConfigYaml(content);
  const withEnv = resolveEnvRecursive(raw, env);
  const merged = deepMerge(isPlainObject(withEnv) ? withEnv : {}, envOverrides(env));

  const result = validateConfigSafe(merged);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in "${absolutePath}": ${result.error}`);
  }
  return result.config;
}
