import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Configuration } from '@pipeask/types';
import YAML from 'yaml';
import { ConfigError, describeError } from '../errors.js';
import { type ConfigKey, DEFAULT_CONFIG_FILE } from './ConfigTypes.js';

export function defaultConfigPath(homeDir: string): string {
  return join(homeDir, DEFAULT_CONFIG_FILE);
}

/** Read and validate the config file at `path`. */
export async function loadConfig(path: string): Promise<Configuration> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigError(`cannot read ${path}: ${describeError(err)}`, { cause: err });
  }

  let data: unknown;
  try {
    data = YAML.parse(content);
  } catch (err) {
    throw new ConfigError(`cannot parse ${path}: ${describeError(err)}`, { cause: err });
  }
  if (!data || typeof data !== 'object' || Array.isArray(data)) {
    throw new ConfigError(`Invalid config ${path}: not a mapping`);
  }
  const fields = new Map<string, unknown>(Object.entries(data));
  const field = (key: ConfigKey): unknown => fields.get(key);

  const apiKey = field('api_key');
  if (typeof apiKey !== 'string' || apiKey === '') {
    throw new ConfigError(`Invalid config ${path}: api_key must be a non-empty string`);
  }
  const model = field('model');
  if (typeof model !== 'string' || model === '') {
    throw new ConfigError(`Invalid config ${path}: model must be a non-empty string`);
  }
  const maxTokens = field('max_tokens');
  if (typeof maxTokens !== 'number' || !Number.isInteger(maxTokens) || maxTokens <= 0) {
    throw new ConfigError(`Invalid config ${path}: max_tokens must be a positive integer`);
  }

  return { apiKey, model, maxTokens };
}
