/**
 * Command helpers shared by every subcommand
 */

import type { Command } from 'commander';
import type { OutputFormat } from '../types/config.js';
import { ConfigError, getConfigService, isOutputFormat } from '../services/config.js';
import { reportError } from './output.js';

export interface GlobalOptions {
  format: OutputFormat;
  verbose: boolean;
  metrics: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  const opts = cmd.optsWithGlobals();
  const rawFormat: unknown = opts.format;
  let format = getConfigService().getFormat();

  if (typeof rawFormat === 'string') {
    if (!isOutputFormat(rawFormat)) {
      throw new ConfigError(`Unknown format "${rawFormat}". Use json, table or csv.`);
    }
    format = rawFormat;
  }

  return {
    format,
    verbose: opts.verbose === true,
    metrics: opts.metrics === true,
  };
}

/**
 * Parse an integer option value; out-of-range input is a usage error
 */
export function parseIntegerOption(value: string, name: string, min: number): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}`);
  }
  return parsed;
}

/**
 * AbortSignal that fires on Ctrl-C; dispose() removes the handler
 */
export function createInterruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => {
      process.removeListener('SIGINT', onInterrupt);
    },
  };
}

/**
 * Run a command action; failures are reported and mapped to process.exitCode
 */
export async function runCommand(
  cmd: Command,
  action: (context: { format: OutputFormat; signal: AbortSignal }) => Promise<void>
): Promise<void> {
  let format: OutputFormat = 'table';
  const interrupt = createInterruptSignal();

  try {
    format = getGlobalOptions(cmd).format;
    await action({ format, signal: interrupt.signal });
  } catch (error) {
    process.exitCode = reportError(error, format);
  } finally {
    interrupt.dispose();
  }
}
