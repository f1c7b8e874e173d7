/**
 * Config Service
 * Reads and writes the config file; environment variables take precedence.
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import type { AppConfig, ConfigKey, OutputFormat } from '../types/config.js';
import { isLogLevel, loggers, type LogLevel } from '../lib/logger.js';
import { CREDENTIALS_FILE } from './credential-store.js';
import { BATCH_DEFAULTS } from './batch.js';

const DEFAULT_CONFIG_FILE = 'config.json';

export const CONFIG_DEFAULTS = {
  redirectPort: 5543,
  apiBaseUrl: 'https://api.spotify.com/v1',
  accountsBaseUrl: 'https://accounts.spotify.com',
  logLevel: 'warn',
  format: 'table',
} as const satisfies Partial<AppConfig>;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'clientId',
  'redirectPort',
  'apiBaseUrl',
  'accountsBaseUrl',
  'logLevel',
  'format',
  'batchConcurrency',
  'batchDelayMs',
];

const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table', 'csv'];

export class ConfigError extends Error {
  public readonly code = 'CONFIG_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function isConfigKey(value: string): value is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(value);
}

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

export function getDefaultConfigDir(): string {
  const override = process.env.MIXTAPE_CONFIG_DIR;
  if (override && override.length > 0) {
    return override;
  }
  return path.join(os.homedir(), '.config', 'mixtape');
}

function parsePositiveInteger(raw: string, key: string, min: number): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function parseUrl(raw: string, key: string): string {
  try {
    return new URL(raw).toString().replace(/\/+$/, '');
  } catch {
    throw new ConfigError(`${key} must be an absolute URL, got "${raw}"`);
  }
}

/**
 * Parse a raw string (CLI or environment) into the typed value for a key
 */
export function parseConfigValue<K extends ConfigKey>(key: K, raw: string): AppConfig[K];
export function parseConfigValue(key: ConfigKey, raw: string): AppConfig[ConfigKey] {
  switch (key) {
    case 'clientId':
      if (raw.trim() === '') {
        throw new ConfigError('clientId must not be empty');
      }
      return raw.trim();
    case 'redirectPort': {
      const port = parsePositiveInteger(raw, key, 1);
      if (port > 65535) {
        throw new ConfigError(`redirectPort must be <= 65535, got "${raw}"`);
      }
      return port;
    }
    case 'apiBaseUrl':
    case 'accountsBaseUrl':
      return parseUrl(raw, key);
    case 'logLevel':
      if (!isLogLevel(raw)) {
        throw new ConfigError(`logLevel must be one of debug, info, warn, error, silent; got "${raw}"`);
      }
      return raw;
    case 'format':
      if (!isOutputFormat(raw)) {
        throw new ConfigError(`format must be one of ${OUTPUT_FORMATS.join(', ')}; got "${raw}"`);
      }
      return raw;
    case 'batchConcurrency':
      return parsePositiveInteger(raw, key, 1);
    case 'batchDelayMs':
      return parsePositiveInteger(raw, key, 0);
  }
}

/**
 * Narrow a parsed config file; unknown keys and ill-typed values are dropped
 */
export function parseAppConfig(value: unknown): AppConfig {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {};
  }

  const config: AppConfig = {};
  for (const [key, raw] of Object.entries(value)) {
    if (!isConfigKey(key) || (typeof raw !== 'string' && typeof raw !== 'number')) {
      continue;
    }
    try {
      Object.assign(config, { [key]: parseConfigValue(key, String(raw)) });
    } catch (error) {
      loggers.store.warn('Ignoring invalid config value', {
        key,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }
  return config;
}

export class ConfigService {
  private configPath: string;
  private config: AppConfig;

  constructor(configPath?: string) {
    this.configPath = configPath || path.join(getDefaultConfigDir(), DEFAULT_CONFIG_FILE);
    this.config = this.load();
  }

  private load(): AppConfig {
    let content: string;
    try {
      content = fs.readFileSync(this.configPath, 'utf-8');
    } catch {
      return {};
    }

    try {
      return parseAppConfig(JSON.parse(content));
    } catch {
      loggers.store.warn('Config file is not valid JSON, using defaults', { path: this.configPath });
      return {};
    }
  }

  private save(): void {
    fs.mkdirSync(path.dirname(this.configPath), { recursive: true });
    fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2), 'utf-8');
  }

  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.config[key];
  }

  set<K extends ConfigKey>(key: K, value: AppConfig[K]): void {
    this.config[key] = value;
    this.save();
  }

  /**
   * Validate and store a raw string value
   */
  setFromString(key: string, raw: string): void {
    if (!isConfigKey(key)) {
      throw new ConfigError(`Unknown config key "${key}". Valid keys: ${CONFIG_KEYS.join(', ')}`);
    }
    this.set(key, parseConfigValue(key, raw));
  }

  getAll(): AppConfig {
    return { ...this.config };
  }

  delete(key: ConfigKey): void {
    delete this.config[key];
    this.save();
  }

  clear(): void {
    this.config = {};
    this.save();
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getConfigDir(): string {
    return path.dirname(this.configPath);
  }

  getCredentialsPath(): string {
    return path.join(this.getConfigDir(), CREDENTIALS_FILE);
  }

  getClientId(): string | undefined {
    return this.fromEnv('MIXTAPE_CLIENT_ID', 'clientId') ?? this.config.clientId;
  }

  getRedirectPort(): number {
    return this.fromEnv('MIXTAPE_REDIRECT_PORT', 'redirectPort') ?? this.config.redirectPort ?? CONFIG_DEFAULTS.redirectPort;
  }

  getApiBaseUrl(): string {
    return this.fromEnv('MIXTAPE_API_BASE', 'apiBaseUrl') ?? this.config.apiBaseUrl ?? CONFIG_DEFAULTS.apiBaseUrl;
  }

  getAccountsBaseUrl(): string {
    return (
      this.fromEnv('MIXTAPE_ACCOUNTS_BASE', 'accountsBaseUrl') ??
      this.config.accountsBaseUrl ??
      CONFIG_DEFAULTS.accountsBaseUrl
    );
  }

  getLogLevel(): LogLevel {
    return this.fromEnv('MIXTAPE_LOG_LEVEL', 'logLevel') ?? this.config.logLevel ?? CONFIG_DEFAULTS.logLevel;
  }

  getFormat(): OutputFormat {
    return this.config.format ?? CONFIG_DEFAULTS.format;
  }

  getBatchOptions(): { maxConcurrency: number; batchDelayMs: number } {
    return {
      maxConcurrency: this.config.batchConcurrency ?? BATCH_DEFAULTS.maxConcurrency,
      batchDelayMs: this.config.batchDelayMs ?? BATCH_DEFAULTS.batchDelayMs,
    };
  }

  /**
   * Effective value for every key, after environment overrides and defaults
   */
  getResolved(): Required<Omit<AppConfig, 'clientId'>> & Pick<AppConfig, 'clientId'> {
    const batch = this.getBatchOptions();
    return {
      clientId: this.getClientId(),
      redirectPort: this.getRedirectPort(),
      apiBaseUrl: this.getApiBaseUrl(),
      accountsBaseUrl: this.getAccountsBaseUrl(),
      logLevel: this.getLogLevel(),
      format: this.getFormat(),
      batchConcurrency: batch.maxConcurrency,
      batchDelayMs: batch.batchDelayMs,
    };
  }

  private fromEnv<K extends ConfigKey>(name: string, key: K): AppConfig[K] | undefined {
    const raw = process.env[name];
    if (raw === undefined || raw.length === 0) {
      return undefined;
    }
    try {
      return parseConfigValue(key, raw);
    } catch (error) {
      loggers.store.warn('Ignoring invalid environment variable', {
        name,
        reason: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }
}

let defaultInstance: ConfigService | null = null;

export function getConfigService(): ConfigService {
  if (!defaultInstance) {
    defaultInstance = new ConfigService();
  }
  return defaultInstance;
}

/**
 * Forget the shared instance (tests)
 */
export function resetConfigService(): void {
  defaultInstance = null;
}
