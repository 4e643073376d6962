/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create config directory ($TEXTVEC_HOME or ~/.textvec)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import {
  ConfigSchema,
  PartialConfigSchema,
  type Config,
  type PartialConfig,
} from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigDir, getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Ensure the config directory exists
 */
function ensureConfigDir(): void {
  const dir = getConfigDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Format Zod issues as an indented bullet list
 */
function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Apply sparse user values on top of a complete config
 */
function mergeConfig(base: Config, override: PartialConfig): Config {
  return {
    model: override.model ?? base.model,
    output: override.output ?? base.output,
    chunk_size: override.chunk_size ?? base.chunk_size,
    embedding: {
      base_url: override.embedding?.base_url ?? base.embedding.base_url,
      timeout_ms: override.embedding?.timeout_ms ?? base.embedding.timeout_ms,
      max_retries: override.embedding?.max_retries ?? base.embedding.max_retries,
      backoff_ms: override.embedding?.backoff_ms ?? base.embedding.backoff_ms,
    },
  };
}

/**
 * Read config.toml without validating its shape
 *
 * @returns Parsed TOML, or an empty table when the file doesn't exist
 */
function readRawConfig(configPath: string): ConfigRecord {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: textvec config reset`
    );
  }
}

/**
 * Convert a plain record into a TOML table, dropping undefined values
 */
function toTomlTable(record: ConfigRecord): TOML.JsonMap {
  const table: TOML.JsonMap = {};
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      table[key] = value;
    } else if (isRecord(value)) {
      table[key] = toTomlTable(value);
    }
  }
  return table;
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - If true, creates default config on first run
 * @throws ConfigError if config file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  // If config doesn't exist, either create it or just use defaults
  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureConfigDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return mergeConfig(DEFAULT_CONFIG, {});
  }

  const parsed = readRawConfig(configPath);

  // Validate against the partial schema (allows missing fields)
  const validationResult = PartialConfigSchema.safeParse(parsed);

  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(validationResult.error.issues)}`,
      'Run: textvec config reset  to restore defaults'
    );
  }

  // Merge user config with defaults
  return mergeConfig(DEFAULT_CONFIG, validationResult.data);
}

/**
 * Every settable key in dot notation, e.g. 'embedding.base_url'
 */
export function getConfigKeys(): string[] {
  return listConfig().map(([key]) => key);
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('embedding.timeout_ms') => 30000
 */
export function getConfigValue(key: string): unknown {
  const config: unknown = loadConfig();
  const parts = key.split('.');

  let current: unknown = config;
  for (const part of parts) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Set a specific config value by dot-notation path
 * Writes the change back to the config file
 */
export function setConfigValue(key: string, value: string): void {
  if (!getConfigKeys().includes(key)) {
    throw new ConfigError(
      `Unknown config key: '${key}'`,
      'Run: textvec config list  to see available keys'
    );
  }

  const configPath = getConfigPath();
  ensureConfigDir();

  // Existing file content, or an empty table
  const config = readRawConfig(configPath);

  // Set the value at the nested path
  const parts = key.split('.');
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError('Invalid config key: empty key');
  }

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const table: ConfigRecord = {};
      current[part] = table;
      current = table;
    }
  }
  current[lastPart] = parseValue(value);

  // Validate the complete config before saving
  const partial = PartialConfigSchema.safeParse(config);
  const validationResult = partial.success
    ? ConfigSchema.safeParse(mergeConfig(DEFAULT_CONFIG, partial.data))
    : partial;

  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(validationResult.error.issues)}`,
      'Run: textvec config list  to see current values and types'
    );
  }

  // Write back to file
  fs.writeFileSync(configPath, TOML.stringify(toTomlTable(config)), 'utf-8');
}

/**
 * Overwrite config.toml with the default template
 */
export function resetConfig(): string {
  ensureConfigDir();
  const configPath = getConfigPath();
  fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  return configPath;
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, and strings
 */
function parseValue(value: string): unknown {
  // Boolean
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  // Number
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  // String (default)
  return value;
}

/**
 * List all config values in a flat format
 * Returns entries like ['embedding.base_url', 'http://localhost:11434']
 */
export function listConfig(): Array<[string, unknown]> {
  const config = loadConfig();
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: ConfigRecord, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isRecord(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config);
  return entries;
}
