import type { LogLevel } from '../lib/logger.js';

export type OutputFormat = 'json' | 'table' | 'csv';

/**
 * Config file shape
 */
export interface AppConfig {
  /** OAuth client id of the registered application */
  clientId?: string;
  /** Loopback port for the login callback */
  redirectPort?: number;
  /** Web API base URL */
  apiBaseUrl?: string;
  /** Accounts (authorize/token) base URL */
  accountsBaseUrl?: string;
  /** Minimum log level */
  logLevel?: LogLevel;
  /** Default output format */
  format?: OutputFormat;
  /** Initial concurrency for batch operations */
  batchConcurrency?: number;
  /** Initial delay between batch chunks (ms) */
  batchDelayMs?: number;
}

/**
 * Config keys
 */
export type ConfigKey = keyof AppConfig;
