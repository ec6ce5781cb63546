/**
 * gantryctl settings, stored in ~/.gantry/config.json and overridable
 * through GANTRY_API_URL / GANTRY_API_TOKEN
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { dirname, join } from 'path';
import { z } from 'zod';
import type { CLIConfiguration } from '@gantry/shared';
import { DEFAULT_CLI_CONFIG } from '@gantry/shared';

const CONFIG_DIR = join(homedir(), '.gantry');
const CONFIG_FILE = join(CONFIG_DIR, 'config.json');

export const CONFIG_KEYS = ['apiUrl', 'apiToken', 'outputFormat'] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

const configFileSchema = z.object({
  apiUrl: z.string().optional(),
  apiToken: z.string().optional(),
  outputFormat: z.enum(['table', 'json']).optional(),
});

type StoredConfig = z.infer<typeof configFileSchema>;

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

/**
 * Read the stored file, or nothing when it is missing or unreadable
 */
function readConfigFile(filePath: string): StoredConfig {
  if (!existsSync(filePath)) {
    return {};
  }

  try {
    const parsed = configFileSchema.safeParse(JSON.parse(readFileSync(filePath, 'utf-8')));
    if (parsed.success) {
      return parsed.data;
    }
    console.warn(`Warning: Ignoring invalid config file ${filePath}`);
  } catch (error) {
    console.warn(`Warning: Failed to parse config file: ${error}`);
  }
  return {};
}

const ENV_OVERRIDES: Partial<Record<ConfigKey, string>> = {
  apiUrl: 'GANTRY_API_URL',
  apiToken: 'GANTRY_API_TOKEN',
};

export type ConfigSource = 'env' | 'file' | 'default' | 'unset';

export interface ResolvedConfigValue {
  key: ConfigKey;
  value: string | undefined;
  source: ConfigSource;
  /** Environment variable that overrides the file, if any */
  envVar?: string;
}

/**
 * Resolve every key and where its value comes from
 *
 * Environment variables win over the file, the file over defaults.
 */
export function resolveConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): ResolvedConfigValue[] {
  const fileConfig = readConfigFile(configPath || CONFIG_FILE);

  return CONFIG_KEYS.map((key): ResolvedConfigValue => {
    const envVar = ENV_OVERRIDES[key];
    const fromEnv = envVar ? env[envVar] : undefined;
    if (fromEnv) {
      return { key, value: fromEnv, source: 'env', envVar };
    }
    const fromFile = fileConfig[key];
    if (fromFile !== undefined) {
      return { key, value: fromFile, source: 'file', envVar };
    }
    const fallback = DEFAULT_CLI_CONFIG[key];
    return fallback !== undefined
      ? { key, value: fallback, source: 'default', envVar }
      : { key, value: undefined, source: 'unset', envVar };
  });
}

/**
 * Effective configuration
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): CLIConfiguration {
  const values = new Map(resolveConfig(configPath, env).map((entry) => [entry.key, entry.value]));
  const outputFormat = values.get('outputFormat');

  return {
    apiUrl: values.get('apiUrl') ?? 'http://localhost:3000',
    apiToken: values.get('apiToken'),
    outputFormat: outputFormat === 'json' ? 'json' : 'table',
  };
}

/**
 * Save configuration to file, merged over what is stored
 */
export function saveConfig(config: StoredConfig, configPath?: string): void {
  const filePath = configPath || CONFIG_FILE;
  mkdirSync(dirname(filePath), { recursive: true });

  const mergedConfig = {
    ...readConfigFile(filePath),
    ...config,
  };

  writeFileSync(filePath, JSON.stringify(mergedConfig, null, 2), 'utf-8');
}

/**
 * Validate and store a single value
 *
 * @returns validation errors; nothing is written when there are any
 */
export function setConfigValue(key: ConfigKey, value: string, configPath?: string): string[] {
  const errors = validateConfig({ [key]: value });
  if (errors.length > 0) {
    return errors;
  }

  const parsed = configFileSchema.safeParse({ [key]: value });
  if (!parsed.success) {
    return parsed.error.issues.map((issue) => `${key}: ${issue.message}`);
  }

  saveConfig(parsed.data, configPath);
  return [];
}

/**
 * Remove a stored value
 *
 * @returns whether the file held a value for the key
 */
export function unsetConfigValue(key: ConfigKey, configPath?: string): boolean {
  const filePath = configPath || CONFIG_FILE;
  const stored = readConfigFile(filePath);
  if (stored[key] === undefined) {
    return false;
  }

  const remaining: StoredConfig = { ...stored };
  delete remaining[key];
  writeFileSync(filePath, JSON.stringify(remaining, null, 2), 'utf-8');
  return true;
}

/**
 * Mask secrets for display
 */
export function displayValue(key: ConfigKey, value: string | undefined): string {
  if (value === undefined) {
    return '(not set)';
  }
  return key === 'apiToken' ? '********' : value;
}

/**
 * Validate configuration
 */
export function validateConfig(config: Partial<Record<ConfigKey, string>>): string[] {
  const errors: string[] = [];

  if (config.apiUrl !== undefined && !/^https?:\/\//.test(config.apiUrl)) {
    errors.push('apiUrl must start with http:// or https://');
  }

  if (config.outputFormat !== undefined && !['table', 'json'].includes(config.outputFormat)) {
    errors.push('outputFormat must be either "table" or "json"');
  }

  return errors;
}

/**
 * Get default config file path
 */
export function getDefaultConfigPath(): string {
  return CONFIG_FILE;
}
