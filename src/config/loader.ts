/**
 * YAML/JSON loading for evaluation config files.
 */

import { readFileSync } from 'node:fs';
import { basename, extname } from 'node:path';
import YAML from 'yaml';
import { ConfigError, describeCause } from '../errors.js';
import { type EvalConfig, evalConfigSchema } from './schema.js';

export type ConfigFormat = 'yaml' | 'json';

/**
 * Load and validate a config file. The format is inferred from the extension
 * unless given.
 */
export function loadConfigFromFile(path: string, fmt?: ConfigFormat): EvalConfig {
  const format = fmt ?? inferFormat(path);
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (e) {
    throw new ConfigError(`Cannot read config file '${path}'`, [describeCause(e)]);
  }
  return loadConfigFromText(content, format);
}

/**
 * Parse and validate config text. An empty document yields the defaults.
 */
export function loadConfigFromText(content: string, fmt: ConfigFormat = 'yaml'): EvalConfig {
  let raw: unknown;
  try {
    raw = fmt === 'yaml' ? YAML.parse(content) : JSON.parse(content);
  } catch (e) {
    throw new ConfigError(`Config is not valid ${fmt.toUpperCase()}`, [describeCause(e)]);
  }
  return loadConfigFromObject(raw ?? {});
}

/**
 * Validate an already-parsed config object.
 */
export function loadConfigFromObject(data: unknown): EvalConfig {
  const parsed = evalConfigSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid config',
      parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`),
    );
  }
  return parsed.data;
}

function inferFormat(path: string): ConfigFormat {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') return 'yaml';
  if (ext === '.json') return 'json';
  throw new ConfigError(
    `Could not infer format for filename '${basename(path)}'. Use the fmt option to specify the format.`,
  );
}
